import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  pipelineConfigFromEnv,
  validatePipelineConfig,
} from './config/pipeline.config';
import { TaskPipelineConfig } from './interfaces/task-pipeline-config.interface';
import { StageRunner } from './stage-runner.service';
import { SubscriberHub } from './subscriber-hub.service';
import { TaskRegistry } from './task-registry.service';
import { TASK_PIPELINE_CONFIG } from './tasks.constants';

/**
 * TasksCoreModule: wires TaskRegistry, SubscriberHub and StageRunner.
 *
 * Usage:
 *   TasksCoreModule.forRoot(config)   explicit config (tests, scripts)
 *   TasksCoreModule.forRootAsync()    config built from ConfigService env
 *
 * All three providers are singletons for the lifetime of the application
 * and are torn down through Nest's shutdown hooks.
 */
@Module({})
export class TasksCoreModule {
  static forRoot(config: TaskPipelineConfig): DynamicModule {
    return TasksCoreModule.build({
      provide: TASK_PIPELINE_CONFIG,
      useValue: validatePipelineConfig(config),
    });
  }

  static forRootAsync(): DynamicModule {
    return {
      ...TasksCoreModule.build({
        provide: TASK_PIPELINE_CONFIG,
        inject: [ConfigService],
        useFactory: (configService: ConfigService): TaskPipelineConfig =>
          pipelineConfigFromEnv(configService),
      }),
      imports: [ConfigModule],
    };
  }

  private static build(configProvider: Provider): DynamicModule {
    return {
      module: TasksCoreModule,
      providers: [configProvider, TaskRegistry, SubscriberHub, StageRunner],
      exports: [TASK_PIPELINE_CONFIG, TaskRegistry, SubscriberHub, StageRunner],
      global: false,
    };
  }
}
