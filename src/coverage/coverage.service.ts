import * as path from 'path';

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { OrderError } from '../common/errors/order-error';
import { AR } from '../common/messages/ar';
import { normalizeArabic } from '../common/utils/arabic-normalize';
import { levenshtein } from '../common/utils/levenshtein';
import { readJsonFile } from '../common/utils/read-json';

import { CoverageZone, validateCoverage } from './coverage.schema';

export interface DistrictMatch extends CoverageZone {
  /** Canonical district name from the coverage file */
  district: string;
}

const DISTRICT_PREFIXES = ['حي ', 'حى ', 'منطقة ', 'شارع '].map((p) => `${normalizeArabic(p)} `);

/** Shorter name must cover this share of the longer one for a containment match */
const CONTAINMENT_RATIO = 0.8;

/** Districts suggested when a district is not covered */
const SUGGESTION_COUNT = 4;

/**
 * Normalize a district name: standard Arabic normalization plus common prefixes removed.
 */
export function normalizeDistrict(district: string): string {
  const text = normalizeArabic(district);
  const prefix = DISTRICT_PREFIXES.find((p) => text.startsWith(p));
  return prefix ? text.slice(prefix.length).trim() : text;
}

/**
 * Delivery coverage data (district → fee/eta) and district validation.
 */
@Injectable()
export class CoverageService implements OnModuleInit {
  private readonly logger = new Logger(CoverageService.name);
  private readonly coveragePath: string;

  private zones: Map<string, CoverageZone> = new Map();
  private normalized: Array<{ key: string; district: string }> = [];

  constructor(private readonly configService: ConfigService) {
    this.coveragePath = this.configService.get<string>(
      'paths.coverage',
      './data/coverage_zones.json',
    );
  }

  async onModuleInit() {
    await this.load();
  }

  async load(): Promise<string[]> {
    const resolvedPath = path.resolve(this.coveragePath);
    this.logger.log(`Loading coverage zones from ${resolvedPath}`);

    const data = await readJsonFile(resolvedPath);
    if (data === null) {
      throw new Error(`Coverage file not found: ${resolvedPath}`);
    }

    const zones = validateCoverage(data, path.basename(resolvedPath));
    this.zones = new Map(Object.entries(zones));
    this.normalized = [...this.zones.keys()].map((district) => ({
      key: normalizeDistrict(district),
      district,
    }));

    this.logger.log(`Loaded ${this.zones.size} coverage zones`);
    return this.zoneNames();
  }

  zoneNames(): string[] {
    return [...this.zones.keys()];
  }

  /**
   * Match in order: exact normalized name, close containment, small edit distance.
   */
  find(district: string): DistrictMatch | undefined {
    const query = normalizeDistrict(district);
    if (!query) {
      return undefined;
    }

    const exact = this.normalized.find((z) => z.key === query);
    if (exact) {
      return this.toMatch(exact.district);
    }

    const contained = this.normalized.find((z) => {
      if (!z.key.includes(query) && !query.includes(z.key)) {
        return false;
      }
      const shorter = Math.min(z.key.length, query.length);
      const longer = Math.max(z.key.length, query.length);
      return shorter >= longer * CONTAINMENT_RATIO;
    });
    if (contained) {
      return this.toMatch(contained.district);
    }

    const close = this.normalized.find((z) => {
      const maxEdits = Math.max(1, Math.floor(z.key.length / 5));
      return levenshtein(query, z.key) <= maxEdits;
    });
    return close ? this.toMatch(close.district) : undefined;
  }

  /**
   * Throws `DistrictNotCovered` with suggested districts when there is no match.
   */
  check(district: string): DistrictMatch {
    const match = this.find(district);
    if (match) {
      return match;
    }

    const suggestions = this.zoneNames().slice(0, SUGGESTION_COUNT);
    this.logger.debug(`District not covered: "${district}"`);
    throw new OrderError('DistrictNotCovered', AR.DISTRICT_NOT_COVERED(district, suggestions), {
      district,
      suggestions,
      pickupAvailable: true,
    });
  }

  private toMatch(district: string): DistrictMatch | undefined {
    const zone = this.zones.get(district);
    return zone ? { district, ...zone } : undefined;
  }
}
