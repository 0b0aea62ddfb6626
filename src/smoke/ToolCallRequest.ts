import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionTool,
} from "openai/resources/chat/completions";

export type ToolCallRequest = ChatCompletionCreateParamsNonStreaming;

export const SYSTEM_PROMPT =
  "You are a helpful assistant with access to tools. Use the get_weather tool to answer the user's question.";
export const USER_PROMPT = "What is the weather in London?";

export const WEATHER_TOOL: ChatCompletionTool = {
  type: "function",
  function: {
    name: "get_weather",
    description: "Get the current weather in a location",
    parameters: {
      type: "object",
      properties: {
        location: { type: "string", description: "The city and state, e.g. San Francisco, CA" },
      },
      required: ["location"],
    },
  },
};

// "required" rather than "auto": a plain-text answer counts as a failure
export function buildToolCallRequest(model: string): ToolCallRequest {
  return {
    model,
    messages: [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: USER_PROMPT },
    ],
    tools: [WEATHER_TOOL],
    tool_choice: "required",
    temperature: 0.0,
  };
}
