import { z } from "zod";
import { Decision, Outcome } from "../types/decision.types";
import { HistoryItem, ModelRole } from "../types/agentEvent.types";
import {
  InferenceRequestBody,
  WireDecision,
  WireHistoryItem,
  WireOutcome,
} from "../types/bridge.types";
import { InferenceMalformedError } from "../errors/agent.errors";

const coordinatesSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const buttonSchema = z.enum(["left", "right", "middle"]);

export const wireDecisionSchema = z.discriminatedUnion("decisionKind", [
  z.object({
    decisionKind: z.literal("click"),
    payload: z.object({
      point: coordinatesSchema,
      button: buttonSchema.default("left"),
      clickCount: z.number().int().min(1).default(1),
    }),
  }),
  z.object({
    decisionKind: z.literal("move"),
    payload: z.object({ point: coordinatesSchema }),
  }),
  z.object({
    decisionKind: z.literal("drag"),
    payload: z.object({
      from: coordinatesSchema,
      to: coordinatesSchema,
      button: buttonSchema.default("left"),
    }),
  }),
  z.object({
    decisionKind: z.literal("type"),
    payload: z.object({ text: z.string() }),
  }),
  z.object({
    decisionKind: z.literal("keyCombo"),
    payload: z.object({ keys: z.array(z.string().min(1)).min(1) }),
  }),
  z.object({
    decisionKind: z.literal("scroll"),
    payload: z.object({ point: coordinatesSchema, delta: coordinatesSchema }),
  }),
  z.object({
    decisionKind: z.literal("wait"),
    payload: z.object({ durationMs: z.number().int().min(0).default(1000) }),
  }),
  z.object({
    decisionKind: z.literal("done"),
    payload: z.object({ summary: z.string().optional() }).default({}),
  }),
  z.object({
    decisionKind: z.literal("replan"),
    payload: z.object({ reason: z.string().default("") }).default({}),
  }),
  z.object({
    decisionKind: z.literal("subgoal"),
    payload: z.object({ instruction: z.string().min(1) }),
  }),
]);

const wireOutcomeSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok") }),
  z.object({ status: z.literal("failed"), reason: z.string() }),
]);

export const wireHistoryItemSchema = z.object({
  decision: wireDecisionSchema.nullable(),
  outcome: wireOutcomeSchema,
  subgoal: z.string().optional(),
});

export const inferenceRequestSchema = z.object({
  image: z.string().min(1),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  instruction: z.string().min(1),
  history: z.array(wireHistoryItemSchema).default([]),
  role: z.enum(["planner", "actor", "unified"]).optional(),
});

export function toWireDecision(decision: Decision): WireDecision {
  switch (decision.kind) {
    case "click":
      return {
        decisionKind: "click",
        payload: {
          point: decision.point,
          button: decision.button,
          clickCount: decision.clickCount,
        },
      };
    case "move":
      return { decisionKind: "move", payload: { point: decision.point } };
    case "drag":
      return {
        decisionKind: "drag",
        payload: { from: decision.from, to: decision.to, button: decision.button },
      };
    case "type":
      return { decisionKind: "type", payload: { text: decision.text } };
    case "keyCombo":
      return { decisionKind: "keyCombo", payload: { keys: decision.keys } };
    case "scroll":
      return {
        decisionKind: "scroll",
        payload: { point: decision.point, delta: decision.delta },
      };
    case "wait":
      return { decisionKind: "wait", payload: { durationMs: decision.durationMs } };
    case "done":
      return {
        decisionKind: "done",
        payload: decision.summary === undefined ? {} : { summary: decision.summary },
      };
    case "replan":
      return { decisionKind: "replan", payload: { reason: decision.reason } };
    case "subgoal":
      return {
        decisionKind: "subgoal",
        payload: { instruction: decision.instruction },
      };
  }
}

type ParsedWireDecision = z.infer<typeof wireDecisionSchema>;

function decisionFromParsed(parsed: ParsedWireDecision): Decision {
  switch (parsed.decisionKind) {
    case "click":
      return { kind: "click", ...parsed.payload };
    case "move":
      return { kind: "move", point: parsed.payload.point };
    case "drag":
      return { kind: "drag", ...parsed.payload };
    case "type":
      return { kind: "type", text: parsed.payload.text };
    case "keyCombo":
      return { kind: "keyCombo", keys: parsed.payload.keys };
    case "scroll":
      return { kind: "scroll", ...parsed.payload };
    case "wait":
      return { kind: "wait", durationMs: parsed.payload.durationMs };
    case "done":
      return parsed.payload.summary === undefined
        ? { kind: "done" }
        : { kind: "done", summary: parsed.payload.summary };
    case "replan":
      return { kind: "replan", reason: parsed.payload.reason };
    case "subgoal":
      return { kind: "subgoal", instruction: parsed.payload.instruction };
  }
}

/**
 * Validates a `{decisionKind, payload}` body received over the wire.
 */
export function fromWireDecision(value: unknown): Decision {
  const result = wireDecisionSchema.safeParse(value);
  if (!result.success) {
    throw new InferenceMalformedError(
      `Invalid decision payload: ${formatIssues(result.error)}`,
      JSON.stringify(value),
    );
  }
  return decisionFromParsed(result.data);
}

export function toWireOutcome(outcome: Outcome): WireOutcome {
  return outcome.status === "ok"
    ? { status: "ok" }
    : { status: "failed", reason: outcome.reason };
}

export function toWireHistory(entries: readonly HistoryItem[]): WireHistoryItem[] {
  return entries.map((entry) => {
    const item: WireHistoryItem = {
      decision: entry.decision ? toWireDecision(entry.decision) : null,
      outcome: toWireOutcome(entry.outcome),
    };
    if (entry.subgoal !== undefined) {
      item.subgoal = entry.subgoal;
    }
    return item;
  });
}

export type ParsedInferenceRequest = {
  image: string;
  width: number;
  height: number;
  instruction: string;
  history: HistoryItem[];
  role?: ModelRole;
};

export function parseInferenceRequest(
  body: unknown,
): { success: true; data: ParsedInferenceRequest } | { success: false; error: string } {
  const result = inferenceRequestSchema.safeParse(body);
  if (!result.success) {
    return { success: false, error: formatIssues(result.error) };
  }

  const { history, ...rest } = result.data;
  return {
    success: true,
    data: {
      ...rest,
      history: history.map((item) => {
        const entry: HistoryItem = {
          decision: item.decision ? decisionFromParsed(item.decision) : null,
          outcome: item.outcome,
        };
        if (item.subgoal !== undefined) {
          entry.subgoal = item.subgoal;
        }
        return entry;
      }),
    },
  };
}

export function toInferenceRequestBody(
  request: Omit<InferenceRequestBody, "history"> & {
    history: readonly HistoryItem[];
  },
): InferenceRequestBody {
  return { ...request, history: toWireHistory(request.history) };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
