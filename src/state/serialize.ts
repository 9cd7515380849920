import { z } from "zod";
import { AgentError } from "../errors.js";
import { MessageLog } from "./messages.js";
import type { AgentState } from "./types.js";

const MessageSchema = z.object({
  role: z.enum(["user", "agent", "tool"]),
  content: z.string(),
  metadata: z.record(z.unknown()),
});

const count = z.number().int().nonnegative();

const baseFields = {
  input: z.string(),
  messages: z.array(MessageSchema),
  status: z.enum(["running", "completed", "truncated", "failed"]),
  currentStep: z.string().min(1),
  trace: z.array(z.string()),
  toolsUsed: z.array(z.string()),
  output: z.string().optional(),
  error: z.string().optional(),
};

const ReflectionStateSchema = z.object({
  ...baseFields,
  strategy: z.literal("reflection"),
  initialResponse: z.string().optional(),
  currentReflection: z.string().optional(),
  refinedResponse: z.string().optional(),
  reflectionCount: count,
  maxReflections: count,
});

const ReActStateSchema = z.object({
  ...baseFields,
  strategy: z.literal("react"),
  thought: z.string().optional(),
  action: z.object({ tool: z.string(), args: z.record(z.unknown()) }).optional(),
  observation: z.string().optional(),
  stepCount: count,
  maxSteps: count,
  finalAnswer: z.string().optional(),
});

const StepRecordSchema = z.object({
  index: count,
  description: z.string(),
  status: z.enum(["succeeded", "failed"]),
  result: z.string().optional(),
  error: z.string().optional(),
});

const PlanningStateSchema = z.object({
  ...baseFields,
  strategy: z.literal("planning"),
  goal: z.string(),
  plan: z.array(z.string()),
  currentStepIndex: count,
  completedSteps: z.array(StepRecordSchema),
  replanCount: count,
  maxReplans: count,
  maxSteps: count,
});

export const SerializedStateSchema = z
  .discriminatedUnion("strategy", [ReflectionStateSchema, ReActStateSchema, PlanningStateSchema])
  .superRefine((state, ctx) => {
    switch (state.strategy) {
      case "reflection":
        if (state.reflectionCount > state.maxReflections) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: "reflectionCount exceeds maxReflections" });
        }
        break;
      case "react":
        if (state.stepCount > state.maxSteps) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: "stepCount exceeds maxSteps" });
        }
        break;
      case "planning":
        if (state.currentStepIndex > state.plan.length) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: "currentStepIndex is outside the plan" });
        }
        if (state.completedSteps.some((record) => record.index >= state.plan.length)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: "completed step index is outside the plan" });
        }
        break;
    }
  });

/** JSON-safe record of an AgentState, sufficient to resume a run. */
export type SerializedState = z.infer<typeof SerializedStateSchema>;

export function serializeState(state: AgentState): SerializedState {
  return structuredClone({ ...state, messages: state.messages.toArray() });
}

export function restoreState(record: unknown): AgentState {
  const parsed = SerializedStateSchema.safeParse(record);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new AgentError("INVALID_STATE", `Serialized state is invalid: ${issues.join("; ")}`, {
      details: { issues },
    });
  }
  return { ...parsed.data, messages: new MessageLog(parsed.data.messages) };
}

export function cloneState(state: AgentState): AgentState {
  return restoreState(serializeState(state));
}
