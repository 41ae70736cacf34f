import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { DecisionClient } from '../../lib';
import { Public } from '../identity/Public';
import { validInputOrThrow } from '../validation';
import { AccessResponse, PublicCheckAccessSchema } from './check-access';

@Public()
@Controller('api/public')
export class PublicController {
  constructor(private readonly decisionClient: DecisionClient) {}

  @Post('check-access')
  @HttpCode(HttpStatus.OK)
  async checkAccess(@Body() body: unknown): Promise<AccessResponse> {
    const { user, action, resource } = validInputOrThrow(PublicCheckAccessSchema, body);
    const decision = await this.decisionClient.decide(user, action, resource);
    return { allowed: decision.allowed };
  }
}
