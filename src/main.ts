import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AGENT_CONFIG, AgentConfig } from './config/agent-config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const config = app.get<AgentConfig>(AGENT_CONFIG);

  app.enableCors({
    origin: config.http.corsOrigins.includes('*') ? true : config.http.corsOrigins,
    methods: ['GET', 'POST'],
    credentials: true,
  });
  app.enableShutdownHooks();

  await app.listen(config.http.port);
  Logger.log(
    `Listening on port ${config.http.port} (${config.aiProvider}/${config.model.name})`,
    'Bootstrap',
  );
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Startup failed: ${error instanceof Error ? error.message : String(error)}`,
    'Bootstrap',
  );
  process.exit(1);
});
