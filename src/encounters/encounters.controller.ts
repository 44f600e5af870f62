import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { EncountersService } from './encounters.service.js';
import {
  EncounterIdParamSchema,
  SubmitActionBodySchema,
  type SubmitActionBody,
} from './dto/submit-action.dto.js';

@Controller('v1/encounters')
@UseGuards(AuthGuard)
export class EncountersController {
  constructor(private readonly encountersService: EncountersService) {}

  @Get('active')
  async getActiveEncounter(@UserId() userId: string) {
    return this.encountersService.getActiveEncounter(userId);
  }

  @Get(':encounterId')
  async getEncounter(
    @Param('encounterId', new ZodValidationPipe(EncounterIdParamSchema)) encounterId: string,
    @UserId() userId: string,
  ) {
    return this.encountersService.getEncounter(userId, encounterId);
  }

  @Post(':encounterId/actions')
  @HttpCode(HttpStatus.OK)
  async submitAction(
    @Param('encounterId', new ZodValidationPipe(EncounterIdParamSchema)) encounterId: string,
    @UserId() userId: string,
    @Body(new ZodValidationPipe(SubmitActionBodySchema)) body: SubmitActionBody,
  ) {
    return this.encountersService.submitAction(userId, encounterId, body);
  }
}
