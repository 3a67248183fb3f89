import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { GamesService } from './games.service.js';
import { CreateGameBodySchema, type CreateGameBody } from './dto/create-game.dto.js';
import { SubmitActionBodySchema, type SubmitActionBody } from './dto/submit-action.dto.js';

@Controller('v1/games')
export class GamesController {
  constructor(private readonly gamesService: GamesService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  createGame(@Body(new ZodValidationPipe(CreateGameBodySchema)) body: CreateGameBody) {
    return this.gamesService.createGame(body);
  }

  @Post(':gameId/actions')
  @HttpCode(HttpStatus.OK)
  submitAction(
    @Param('gameId') gameId: string,
    @Body(new ZodValidationPipe(SubmitActionBodySchema)) body: SubmitActionBody,
  ) {
    return this.gamesService.submitAction(gameId, body.action, body.expectedSeq);
  }

  @Get(':gameId')
  getGame(@Param('gameId') gameId: string) {
    return this.gamesService.getGame(gameId);
  }

  @Get(':gameId/log')
  getLog(@Param('gameId') gameId: string) {
    return this.gamesService.getLog(gameId);
  }

  @Get(':gameId/replay')
  verifyReplay(@Param('gameId') gameId: string) {
    return this.gamesService.verifyReplay(gameId);
  }
}
