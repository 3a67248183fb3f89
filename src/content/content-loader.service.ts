// content/*.json load + in-memory cache

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { isAbsolute, join } from 'path';
import type { WeaponProfile } from '../types/index.js';
import { ContentError } from '../common/errors/game-errors.js';
import { formatZodIssues } from '../common/pipes/zod-validation.pipe.js';
import { EngineConfigService } from '../engine/engine-config.service.js';
import { weaponListSchema } from './content.types.js';
import type { WeaponCatalog } from './content.types.js';

@Injectable()
export class ContentLoaderService implements OnModuleInit, WeaponCatalog {
  private readonly logger = new Logger(ContentLoaderService.name);
  private weapons = new Map<string, WeaponProfile>();

  constructor(private readonly configService: EngineConfigService) {}

  async onModuleInit() {
    await this.loadAll();
  }

  private get contentDir(): string {
    const dir = this.configService.get().contentDir;
    return isAbsolute(dir) ? dir : join(process.cwd(), dir);
  }

  async loadAll(): Promise<void> {
    const file = join(this.contentDir, 'weapons.json');
    const raw = await readFile(file, 'utf-8');
    this.registerWeapons(this.parseWeapons(raw, file));
    this.logger.log(`Loaded ${this.weapons.size} weapon profiles from ${file}`);
  }

  registerWeapons(profiles: WeaponProfile[]): void {
    const next = new Map<string, WeaponProfile>();
    for (const w of profiles) {
      if (next.has(w.id)) {
        throw new ContentError(`Duplicate weapon id: ${w.id}`);
      }
      next.set(w.id, w);
    }
    this.weapons = next;
  }

  getWeapon(id: string): WeaponProfile | undefined {
    return this.weapons.get(id);
  }

  getAllWeapons(): WeaponProfile[] {
    return [...this.weapons.values()];
  }

  private parseWeapons(raw: string, file: string): WeaponProfile[] {
    const parsed = weaponListSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new ContentError(`Invalid weapon content in ${file}`, {
        issues: formatZodIssues(parsed.error.issues),
      });
    }
    return parsed.data;
  }
}
