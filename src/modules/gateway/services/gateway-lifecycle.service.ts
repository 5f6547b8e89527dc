import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { WebhookTaskRunner } from '../../../core';
import { GATEWAY_DATA_SOURCE, WEBHOOK_TASK_RUNNER } from '../constants';

/**
 * Stops webhook verification tasks and closes the database on shutdown
 */
@Injectable()
export class GatewayLifecycleService implements OnModuleDestroy {
  private readonly logger = new Logger(GatewayLifecycleService.name);

  constructor(
    @Inject(WEBHOOK_TASK_RUNNER)
    private readonly taskRunner: WebhookTaskRunner,
    @Inject(GATEWAY_DATA_SOURCE)
    private readonly dataSource: DataSource | null,
  ) {}

  async onModuleDestroy(): Promise<void> {
    const pending = this.taskRunner.inFlight;
    await this.taskRunner.shutdown();
    this.logger.log(`Webhook task runner stopped (${pending} task(s) aborted)`);

    if (this.dataSource?.isInitialized) {
      await this.dataSource.destroy();
    }
  }
}
