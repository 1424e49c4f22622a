/**
 * RepositoryModule: dynamic module that provides the member, game and API
 * application repositories.
 *
 * Selects the persistence backend via the PERSISTENCE_BACKEND environment variable:
 *   - "postgres" (default) → Postgres*Repository over a pg pool
 *   - "inmemory"           → InMemory*Repository
 *
 * Usage:
 *   imports: [RepositoryModule.register()]
 */
import { Module, type DynamicModule } from '@nestjs/common';
import {
  MEMBER_REPOSITORY,
  GAME_REPOSITORY,
  API_APPLICATION_REPOSITORY,
} from '../../domain/repositories/repository.tokens';
import { PostgresMemberRepository } from './postgres/postgres-member.repository';
import { PostgresGameRepository } from './postgres/postgres-game.repository';
import { PostgresApiApplicationRepository } from './postgres/postgres-api-application.repository';
import { InMemoryMemberRepository } from './inmemory/inmemory-member.repository';
import { InMemoryGameRepository } from './inmemory/inmemory-game.repository';
import { InMemoryApiApplicationRepository } from './inmemory/inmemory-api-application.repository';
import { DatabaseModule } from '../../modules/database/database.module';

const TOKENS = [MEMBER_REPOSITORY, GAME_REPOSITORY, API_APPLICATION_REPOSITORY];

@Module({})
export class RepositoryModule {
  static register(): DynamicModule {
    const backend = (process.env.PERSISTENCE_BACKEND ?? 'postgres').toLowerCase();

    if (backend === 'inmemory') {
      return {
        module: RepositoryModule,
        global: true,
        providers: [
          { provide: MEMBER_REPOSITORY, useClass: InMemoryMemberRepository },
          { provide: GAME_REPOSITORY, useClass: InMemoryGameRepository },
          { provide: API_APPLICATION_REPOSITORY, useClass: InMemoryApiApplicationRepository },
        ],
        exports: TOKENS,
      };
    }

    return {
      module: RepositoryModule,
      global: true,
      imports: [DatabaseModule],
      providers: [
        { provide: MEMBER_REPOSITORY, useClass: PostgresMemberRepository },
        { provide: GAME_REPOSITORY, useClass: PostgresGameRepository },
        { provide: API_APPLICATION_REPOSITORY, useClass: PostgresApiApplicationRepository },
      ],
      exports: TOKENS,
    };
  }
}
