import { Controller, Get, Logger } from '@nestjs/common';
import { ApiResponse } from '@nestjs/swagger';
import { FormattedValue } from '../formatting/domain/formatted-value';
import { NATURAL_TEMPLATE } from '../formatting/domain/template';

// Known answer: rounding at the tens place moves into the exponent
const CANARY = { value: '656', error: '10', expected: '(66 ± 1) x 10^1 \\meter' };

@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  @Get()
  @ApiResponse({ status: 200, description: 'Health check passed' })
  check() {
    this.logger.debug('Health check requested');

    const checks = {
      engine: this.checkEngine()
    };

    const allHealthy = Object.values(checks).every(check => check.status === 'UP');

    return {
      status: allHealthy ? 'UP' : 'DEGRADED',
      timestamp: new Date().toISOString(),
      checks
    };
  }

  private checkEngine(): { status: 'UP' | 'DOWN' } {
    try {
      const rendered = new FormattedValue(CANARY.value, CANARY.error)
        .formatted(NATURAL_TEMPLATE, '\\meter');
      if (rendered !== CANARY.expected) {
        this.logger.error('Engine canary mismatch', { rendered, expected: CANARY.expected });
        return { status: 'DOWN' };
      }
      return { status: 'UP' };
    } catch (error) {
      this.logger.error('Engine health check failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      return { status: 'DOWN' };
    }
  }
}
