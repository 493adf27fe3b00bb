import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { AllConfigType } from '../config/config.type';
import { missingCardSourceSetting } from './config/card-source.settings';
import { CardIngestionDomainService } from './domain/services/card-ingestion.domain.service';

/**
 * Hourly pass over the card source.
 *
 * Disabled unless CARD_INGESTION_SCHEDULE_ENABLED=true and the source is
 * configured. A tick that finds the previous run still going does nothing.
 */
@Injectable()
export class CardIngestionScheduler {
  private readonly logger = new Logger(CardIngestionScheduler.name);
  private running = false;

  constructor(
    private readonly domainService: CardIngestionDomainService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  @Cron(CronExpression.EVERY_HOUR, {
    name: 'card-ingestion',
    timeZone: 'UTC',
  })
  async handleScheduledIngestion(): Promise<void> {
    const enabled = this.configService.get('cardIngestion.scheduleEnabled', {
      infer: true,
    });
    const config = this.configService.getOrThrow('cardIngestion', {
      infer: true,
    });
    if (!enabled || missingCardSourceSetting(config)) {
      return;
    }

    if (this.running) {
      this.logger.warn('[SCHEDULER] Previous run still in progress, skipping');
      return;
    }

    this.running = true;
    const startTime = Date.now();
    try {
      const summary = await this.domainService.runIngestion();
      this.logger.log(
        `[SCHEDULER] Run finished in ${Date.now() - startTime}ms - Total: ${summary.total}, Failed: ${summary.failed}`,
      );
    } catch (error) {
      this.logger.error(
        `[SCHEDULER] Run failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    } finally {
      this.running = false;
    }
  }
}
