import { z } from 'zod';
import { ToolOutput } from '../types/conversation';
import { ToolName } from './tool-schemas';

/**
 * A tool the planning loop can dispatch. Arguments arrive already
 * validated against `schema`.
 */
export interface AgentTool<A> {
  readonly name: ToolName;
  readonly schema: z.ZodType<A, z.ZodTypeDef, unknown>;
  /** Latency breakdown key the tool's elapsed time is recorded under */
  readonly timingStep: string;
  execute(args: A): Promise<ToolOutput>;
}
