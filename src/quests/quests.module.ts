import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { EncountersModule } from '../encounters/encounters.module.js';
import { PlayerModule } from '../player/player.module.js';
import { QuestsController } from './quests.controller.js';
import { QuestsService } from './quests.service.js';

@Module({
  imports: [EngineModule, PlayerModule, EncountersModule],
  controllers: [QuestsController],
  providers: [QuestsService],
  exports: [QuestsService],
})
export class QuestsModule {}
