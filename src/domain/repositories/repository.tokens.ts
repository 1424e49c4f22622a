/**
 * NestJS injection tokens for repository interfaces.
 *
 * Usage:
 *   @Inject(GAME_REPOSITORY) private readonly games: IGameRepository
 */
export const MEMBER_REPOSITORY = 'MEMBER_REPOSITORY';
export const GAME_REPOSITORY = 'GAME_REPOSITORY';
export const API_APPLICATION_REPOSITORY = 'API_APPLICATION_REPOSITORY';
