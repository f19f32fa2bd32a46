import { Module } from '@nestjs/common';
import { ProcessRunnerPort } from './domain/ports/process-runner.port';
import { NodeProcessRunnerAdapter } from './infrastructure/node-process-runner.adapter';

@Module({
  providers: [
    {
      provide: ProcessRunnerPort,
      useClass: NodeProcessRunnerAdapter,
    },
  ],
  exports: [ProcessRunnerPort],
})
export class ExternalToolsModule {}
