import { Controller, Get } from '@nestjs/common';
import { AgentService } from '../ai/agent.service';

export interface HealthResponse {
  status: 'ok';
  agent_initialized: boolean;
}

/**
 * Liveness check.
 */
@Controller('health')
export class HealthController {
  constructor(private readonly agentService: AgentService) {}

  @Get()
  check(): HealthResponse {
    return {
      status: 'ok',
      agent_initialized: this.agentService.getStatus().ready,
    };
  }
}
