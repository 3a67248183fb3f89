import { ContentLoaderService } from './content-loader.service.js';
import { EngineConfigService } from '../engine/engine-config.service.js';
import { TEST_WEAPONS } from '../engine/testing/fixtures.js';
import { ContentError } from '../common/errors/game-errors.js';

describe('ContentLoaderService', () => {
  let config: EngineConfigService;
  let service: ContentLoaderService;

  beforeEach(() => {
    config = new EngineConfigService();
    config.update({ contentDir: 'content' });
    service = new ContentLoaderService(config);
  });

  it('loads the shipped weapon profiles', async () => {
    await service.onModuleInit();

    expect(service.getAllWeapons()).toHaveLength(12);
    expect(service.getWeapon('power_fist')).toEqual({
      id: 'power_fist',
      name: 'Power fist',
      type: 'MELEE',
      range: 0,
      attacks: 3,
      skill: 3,
      strength: 8,
      ap: -2,
      damage: 2,
      keywords: [],
    });
    expect(service.getWeapon('heavy_bolter')?.range).toBe(36);
    expect(service.getWeapon('missing')).toBeUndefined();
  });

  it('fails when the content directory has no weapons file', async () => {
    config.update({ contentDir: 'no-such-content-dir' });
    await expect(service.loadAll()).rejects.toThrow();
  });

  it('rejects duplicate ids', () => {
    expect(() => service.registerWeapons([TEST_WEAPONS[0], TEST_WEAPONS[0]])).toThrow(
      ContentError,
    );
  });

  it('replaces the catalog on register', () => {
    service.registerWeapons(TEST_WEAPONS);
    expect(service.getWeapon('bolt_rifle')?.name).toBe('Bolt rifle');
    service.registerWeapons([TEST_WEAPONS[1]]);
    expect(service.getWeapon('bolt_rifle')).toBeUndefined();
  });
});
