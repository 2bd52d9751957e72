import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage,
} from '@langchain/core/messages';
import { extractTextFromContent, toLangChainMessages } from './message-utils';
import { Message } from '../types/conversation';

describe('message-utils', () => {
  describe('toLangChainMessages', () => {
    it('should prefix the system prompt', () => {
      const result = toLangChainMessages('policy', [
        { role: 'user', content: 'Hello' },
      ]);

      expect(result).toHaveLength(2);
      expect(result[0]).toBeInstanceOf(SystemMessage);
      expect(result[0].content).toBe('policy');
      expect(result[1]).toBeInstanceOf(HumanMessage);
      expect(result[1].content).toBe('Hello');
    });

    it('should convert tool-call turns and tool results', () => {
      const messages: Message[] = [
        { role: 'user', content: 'Weather in Cairo?' },
        {
          role: 'assistant',
          content: null,
          toolCalls: [
            { id: 'call_1', name: 'weather_query', args: { location: 'Cairo' } },
          ],
        },
        {
          role: 'tool',
          content: 'clear sky, 30C',
          toolCallId: 'call_1',
          toolName: 'weather_query',
        },
      ];

      const [, , assistant, tool] = toLangChainMessages('policy', messages);

      expect(assistant).toBeInstanceOf(AIMessage);
      expect(assistant.content).toBe('');
      expect(assistant instanceof AIMessage && assistant.tool_calls).toEqual([
        {
          id: 'call_1',
          name: 'weather_query',
          args: { location: 'Cairo' },
          type: 'tool_call',
        },
      ]);
      expect(tool).toBeInstanceOf(ToolMessage);
      expect(tool instanceof ToolMessage && tool.tool_call_id).toBe('call_1');
      expect(tool.content).toBe('clear sky, 30C');
    });
  });

  describe('extractTextFromContent', () => {
    it('should return plain string content', () => {
      expect(extractTextFromContent('hello')).toBe('hello');
    });

    it('should join text parts of multi-part content', () => {
      expect(
        extractTextFromContent([
          { type: 'text', text: 'Hello' },
          { type: 'image_url', image_url: 'http://example.com/x.png' },
          { type: 'text', text: ' world' },
        ]),
      ).toBe('Hello world');
    });

    it('should return an empty string for undefined content', () => {
      expect(extractTextFromContent(undefined)).toBe('');
    });
  });
});
