import { Controller, Get, HttpCode, HttpStatus, Param, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { QuestsService } from './quests.service.js';
import { QuestIdParamSchema } from './dto/start-quest.dto.js';

@Controller('v1/quests')
@UseGuards(AuthGuard)
export class QuestsController {
  constructor(private readonly questsService: QuestsService) {}

  @Get()
  async getBoard(@UserId() userId: string) {
    return this.questsService.getBoard(userId);
  }

  @Post(':questId/start')
  @HttpCode(HttpStatus.CREATED)
  async startQuest(
    @Param('questId', new ZodValidationPipe(QuestIdParamSchema)) questId: string,
    @UserId() userId: string,
  ) {
    return this.questsService.startQuest(userId, questId);
  }
}
