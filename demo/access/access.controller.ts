import { Body, Controller, HttpCode, HttpStatus, Post, Req } from '@nestjs/common';
import { DecisionClient, GatewayRequest, RequestMapper } from '../../lib';
import { validInputOrThrow } from '../validation';
import { AccessResponse, CheckAccessSchema } from './check-access';

@Controller('api')
export class AccessController {
  constructor(
    private readonly decisionClient: DecisionClient,
    private readonly mapper: RequestMapper,
  ) {}

  /** Asks the engine whether the caller may perform `action` on `resource`. */
  @Post('check-access')
  @HttpCode(HttpStatus.OK)
  async checkAccess(@Req() request: GatewayRequest, @Body() body: unknown): Promise<AccessResponse> {
    const { action, resource } = validInputOrThrow(CheckAccessSchema, body);
    const subject = this.mapper.subjectOf(request.user);
    const decision = await this.decisionClient.decide(subject, action, resource);
    return { allowed: decision.allowed };
  }
}
