import { InMemoryApiApplicationRepository } from '../../infrastructure/repositories/inmemory/inmemory-api-application.repository';
import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import { ApiApplicationService } from './api-application.service';
import {
  ScopeAuthorizer,
  parseBasicCredentials,
  parseScopes,
} from './scope-authorizer.service';

function basic(value: string): string {
  return `Basic ${Buffer.from(value, 'utf8').toString('base64')}`;
}

describe('scope-authorizer', () => {
  // ─── parseScopes ──────────────────────────────────────────────────

  describe('parseScopes', () => {
    it('should split on any whitespace and collapse duplicates', () => {
      expect([...parseScopes('  games:read\tgames:new  games:read\n')]).toEqual(['games:read', 'games:new']);
    });

    it('should return an empty set for an empty string', () => {
      expect(parseScopes('').size).toBe(0);
    });
  });

  // ─── parseBasicCredentials ────────────────────────────────────────

  describe('parseBasicCredentials', () => {
    it('should decode id and secret', () => {
      expect(parseBasicCredentials(basic('app1:secret1'))).toEqual({ principal: 'app1', secret: 'secret1' });
    });

    it('should keep colons inside the secret', () => {
      expect(parseBasicCredentials(basic('app1:a:b'))).toEqual({ principal: 'app1', secret: 'a:b' });
    });

    it('should accept a lowercase scheme', () => {
      expect(parseBasicCredentials(`basic ${Buffer.from('app1:x').toString('base64')}`)?.principal).toBe('app1');
    });

    it.each([
      ['a missing header', undefined],
      ['an empty header', ''],
      ['a Bearer header', 'Bearer abc'],
      ['no separator', basic('app1secret1')],
      ['an empty app id', basic(':secret1')],
    ])('should return null for %s', (_label, header) => {
      expect(parseBasicCredentials(header)).toBeNull();
    });
  });

  // ─── ScopeAuthorizer ──────────────────────────────────────────────

  describe('ScopeAuthorizer', () => {
    let logger: GatewayLogger;
    let authorizer: ScopeAuthorizer;

    beforeEach(async () => {
      logger = new GatewayLogger();
      jest.spyOn(logger, 'warn').mockImplementation();
      jest.spyOn(logger, 'info').mockImplementation();
      const applications = new ApiApplicationService(new InMemoryApiApplicationRepository());
      await applications.register('app1', 'secret1', 'games:read games:new');
      authorizer = new ScopeAuthorizer(applications, logger);
    });

    it('should return the stored scope set for valid credentials', async () => {
      const result = await authorizer.authorize({ principal: 'app1', secret: 'secret1' });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.appId).toBe('app1');
        expect([...result.value.scopes].sort()).toEqual(['games:new', 'games:read']);
      }
      expect(logger.info).toHaveBeenCalledWith(LogCategory.AUTH, 'Successful app authentication for app app1');
    });

    it('should return the same scopes on every call', async () => {
      const first = await authorizer.authorize({ principal: 'app1', secret: 'secret1' });
      const second = await authorizer.authorize({ principal: 'app1', secret: 'secret1' });
      expect(first).toEqual(second);
    });

    it('should reject unknown credentials as unauthorized', async () => {
      const result = await authorizer.authorize({ principal: 'app1', secret: 'wrong' });
      expect(result).toEqual({
        ok: false,
        error: { kind: 'auth', reason: 'unauthorized', detail: 'Incorrect app ID or token.' },
      });
      expect(logger.warn).toHaveBeenCalledWith(LogCategory.AUTH, 'Failed app authentication attempted with app app1');
    });

    it('should reject missing credentials as unauthorized', async () => {
      const result = await authorizer.authorize(null);
      expect(result.ok).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(LogCategory.AUTH, 'Missing or malformed Authorization header');
    });

    it('requireScope should pass when the scope is held', () => {
      const principal = { appId: 'app1', scopes: parseScopes('games:read') };
      expect(authorizer.requireScope(principal, 'games:read')).toEqual({ ok: true, value: principal });
    });

    it('requireScope should be forbidden, not unauthorized, when the scope is missing', () => {
      const principal = { appId: 'app1', scopes: parseScopes('games:read') };
      expect(authorizer.requireScope(principal, 'games:new')).toEqual({
        ok: false,
        error: { kind: 'auth', reason: 'forbidden', requiredScope: 'games:new' },
      });
      expect(logger.warn).toHaveBeenCalledWith(LogCategory.AUTH, 'App app1 lacks scope games:new');
    });
  });
});
