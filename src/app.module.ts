import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { GamesModule } from './games/games.module.js';

@Module({
  imports: [ContentModule, EngineModule, GamesModule],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
