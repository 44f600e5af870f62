import { Controller, Get, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { PlayerService } from './player.service.js';

@Controller('v1/player')
@UseGuards(AuthGuard)
export class PlayerController {
  constructor(private readonly playerService: PlayerService) {}

  @Get()
  async getPlayer(@UserId() userId: string) {
    return this.playerService.getPlayer(userId);
  }

  @Post('energy/refill')
  @HttpCode(HttpStatus.OK)
  async refillEnergy(@UserId() userId: string) {
    return this.playerService.refillWithSoulShards(userId);
  }

  @Post('energy/refill-test')
  @HttpCode(HttpStatus.OK)
  async refillEnergyForTesting(@UserId() userId: string) {
    return this.playerService.refillForTesting(userId);
  }
}
