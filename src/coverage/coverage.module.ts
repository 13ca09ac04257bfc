import { Module } from '@nestjs/common';

import { CoverageService } from './coverage.service';

/**
 * Coverage Module
 *
 * Loads delivery coverage zones and validates customer districts.
 */
@Module({
  imports: [],
  providers: [CoverageService],
  exports: [CoverageService],
})
export class CoverageModule {}
