import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import {
  CircuitSnapshot,
  DecisionClient,
  DecisionMetrics,
  DecisionMetricsSnapshot,
  HealthDetail,
  PolicyEngineHealthProbe,
} from '../../lib';
import { Public } from '../identity/Public';

interface StatusResponse {
  status(code: number): unknown;
}

export interface HealthReport {
  status: 'UP' | 'DOWN';
  components: {
    policyEngine: { status: 'UP' | 'DOWN'; details: HealthDetail };
    circuitBreaker: CircuitSnapshot;
  };
  metrics: DecisionMetricsSnapshot;
}

@Public()
@Controller('actuator')
export class HealthController {
  constructor(
    private readonly probe: PolicyEngineHealthProbe,
    private readonly decisionClient: DecisionClient,
    private readonly metrics: DecisionMetrics,
  ) {}

  @Get('health')
  async health(@Res({ passthrough: true }) response: StatusResponse): Promise<HealthReport> {
    const engine = await this.probe.check();
    const status = engine.up ? 'UP' : 'DOWN';
    if (!engine.up) {
      response.status(HttpStatus.SERVICE_UNAVAILABLE);
    }
    return {
      status,
      components: {
        policyEngine: { status, details: engine.detail },
        circuitBreaker: this.decisionClient.circuitSnapshot(),
      },
      metrics: this.metrics.snapshot(),
    };
  }
}
