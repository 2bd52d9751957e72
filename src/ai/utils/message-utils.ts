/**
 * Conversions between the agent's conversation model and LangChain messages.
 */
import {
  AIMessage,
  BaseMessage,
  HumanMessage,
  MessageContent,
  SystemMessage,
  ToolMessage,
} from '@langchain/core/messages';
import { Message } from '../types/conversation';

/**
 * Convert conversation state to LangChain messages, prefixed by the policy
 * instruction as a SystemMessage.
 */
export function toLangChainMessages(
  systemPrompt: string,
  messages: readonly Message[],
): BaseMessage[] {
  const converted = messages.map((msg): BaseMessage => {
    switch (msg.role) {
      case 'user':
        return new HumanMessage(msg.content);
      case 'assistant':
        return new AIMessage({
          content: msg.content ?? '',
          tool_calls: msg.toolCalls.map((call) => ({
            id: call.id,
            name: call.name,
            args: { ...call.args },
            type: 'tool_call' as const,
          })),
        });
      case 'tool':
        return new ToolMessage({
          content: msg.content,
          tool_call_id: msg.toolCallId,
          name: msg.toolName,
        });
    }
  });
  return [new SystemMessage(systemPrompt), ...converted];
}

/**
 * Extract text from LangChain content: plain strings or multi-part arrays
 * of `{ type: 'text', text }` blocks. Other blocks are ignored.
 */
export function extractTextFromContent(
  content: MessageContent | undefined,
): string {
  if (typeof content === 'string') {
    return content;
  }
  if (!Array.isArray(content)) {
    return '';
  }

  const textParts: string[] = [];
  for (const part of content) {
    if (
      typeof part === 'object' &&
      part !== null &&
      'type' in part &&
      part.type === 'text' &&
      'text' in part &&
      typeof part.text === 'string'
    ) {
      textParts.push(part.text);
    }
  }
  return textParts.join('');
}
