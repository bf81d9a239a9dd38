export type MessageRole = "system" | "user" | "assistant" | "tool";

export type ToolArguments = Record<string, unknown>;

export type ToolCallRequest = {
  /** Opaque id, unique within one assistant turn. */
  id: string;
  toolName: string;
  arguments: ToolArguments;
};

export type SystemMessage = { role: "system"; content: string };
export type UserMessage = { role: "user"; content: string };
export type AssistantTextMessage = { role: "assistant"; content: string };
export type AssistantToolCallMessage = {
  role: "assistant";
  content: null;
  toolCalls: readonly ToolCallRequest[];
};
export type ToolMessage = { role: "tool"; toolCallId: string; content: string };

export type Message =
  | SystemMessage
  | UserMessage
  | AssistantTextMessage
  | AssistantToolCallMessage
  | ToolMessage;

export type ToolDescriptor = {
  name: string;
  description: string;
  /** JSON schema of the accepted arguments. */
  parameterSchema: Record<string, unknown>;
};

export type Decision =
  | { kind: "final"; text: string }
  | { kind: "tool_requests"; calls: readonly ToolCallRequest[] };

export type AgentState = "AwaitingUserInput" | "Reasoning" | "ExecutingTools" | "Terminating";

export function isToolCallMessage(message: Message): message is AssistantToolCallMessage {
  return message.role === "assistant" && "toolCalls" in message;
}
