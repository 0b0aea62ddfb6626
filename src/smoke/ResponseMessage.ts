import type { ChatCompletionMessageToolCall } from "openai/resources/chat/completions";

import { ResponseShapeError } from "./errors";
import { isRecord, parseJsonOrRaw } from "../utils/json";

export interface ResponseMessage {
  content: string | null;
  toolCalls?: ChatCompletionMessageToolCall[];
}

export interface ToolCallSummary {
  name: string;
  arguments: unknown; // decoded JSON, or the raw string when it does not decode
}

/**
 * Coerces one `tool_calls` entry into the OpenAI shape. Local servers
 * sometimes omit `id` or send `arguments` as an object, so missing pieces
 * are filled in rather than rejected.
 */
export function toToolCall(call: unknown): ChatCompletionMessageToolCall {
  const record: Record<string, unknown> = isRecord(call) ? call : {};
  const fn: Record<string, unknown> = isRecord(record.function) ? record.function : {};
  const args = fn.arguments;
  return {
    id: typeof record.id === "string" ? record.id : "",
    type: "function",
    function: {
      name: typeof fn.name === "string" ? fn.name : "(unnamed)",
      arguments: typeof args === "string" ? args : JSON.stringify(args ?? null),
    },
  };
}

/** Pulls `choices[0].message` out of a decoded chat-completion response. */
export function extractFirstMessage(data: unknown): ResponseMessage {
  if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) {
    throw new ResponseShapeError("response has no choices");
  }
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    throw new ResponseShapeError("first choice has no message");
  }
  const { content, tool_calls: toolCalls } = first.message;
  return {
    // content-part arrays are kept as their JSON text
    content: typeof content === "string" ? content : content == null ? null : JSON.stringify(content),
    toolCalls: Array.isArray(toolCalls) ? toolCalls.map(toToolCall) : undefined,
  };
}

export function summarizeToolCall(call: ChatCompletionMessageToolCall): ToolCallSummary {
  return { name: call.function.name, arguments: parseJsonOrRaw(call.function.arguments) };
}

export function formatToolCall(call: ToolCallSummary): string {
  const args = typeof call.arguments === "string" ? call.arguments : JSON.stringify(call.arguments);
  return `  → ${call.name}(${args})`;
}
