import { GatewayLogger } from '../logging/gateway-logger.service';
import { LogCategory } from '../logging/log-levels';
import type { TenantConfig } from './tenant-config';
import { TenantConfigService } from './tenant-config.service';

describe('TenantConfigService', () => {
  let logger: GatewayLogger;

  const config: TenantConfig = {
    source: 'config/tenants.json',
    defaultPrefix: '$',
    primaryTenantId: '1',
    tenants: {
      '1': { name: 'Main', commandPrefix: '!', minimumRoleName: 'Member' },
      '2': { name: 'No prefix' },
    },
  };

  function createService(value: TenantConfig = config): TenantConfigService {
    return new TenantConfigService(value, logger);
  }

  beforeEach(() => {
    logger = new GatewayLogger();
    jest.spyOn(logger, 'warn').mockImplementation();
    jest.spyOn(logger, 'info').mockImplementation();
  });

  describe('getPrefix', () => {
    it('should return the configured prefix', () => {
      expect(createService().getPrefix('1')).toBe('!');
    });

    it('should fall back to the default for a tenant without a prefix', () => {
      expect(createService().getPrefix('2')).toBe('$');
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should warn and fall back to the default for an unknown tenant', () => {
      expect(createService().getPrefix('999')).toBe('$');
      expect(logger.warn).toHaveBeenCalledWith(
        LogCategory.TENANT,
        'Message received from unconfigured tenant 999; using default prefix',
      );
    });

    it('should not be fooled by inherited property names', () => {
      expect(createService().getPrefix('constructor')).toBe('$');
    });
  });

  describe('getSetting', () => {
    it('should return a tenant setting', () => {
      expect(createService().getSetting('1', 'minimumRoleName')).toBe('Member');
    });

    it('should return undefined for an unknown tenant or unset key', () => {
      expect(createService().getSetting('404', 'name')).toBeUndefined();
      expect(createService().getSetting('2', 'minimumRoleName')).toBeUndefined();
    });
  });

  describe('onModuleInit', () => {
    it('should log the number of loaded tenants', () => {
      createService().onModuleInit();
      expect(logger.info).toHaveBeenCalledWith(LogCategory.TENANT, 'Loaded 2 tenant(s)', {
        source: 'config/tenants.json',
        primaryTenantId: '1',
      });
    });

    it('should warn when no file was found', () => {
      createService({ source: null, defaultPrefix: '$', primaryTenantId: null, tenants: {} }).onModuleInit();
      expect(logger.warn).toHaveBeenCalledWith(
        LogCategory.TENANT,
        'No tenant config file found; every tenant uses the default prefix',
        { defaultPrefix: '$' },
      );
    });
  });

  it('should expose the defaults', () => {
    const service = createService();
    expect(service.defaultPrefix).toBe('$');
    expect(service.primaryTenantId).toBe('1');
    expect(service.hasTenant('2')).toBe(true);
    expect(service.hasTenant('3')).toBe(false);
  });
});
