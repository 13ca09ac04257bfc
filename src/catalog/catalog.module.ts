import { Module } from '@nestjs/common';

import { CatalogService } from './catalog.service';
import { CatalogResolverService } from './services';

/**
 * Catalog Module
 *
 * Loads the menu, serves direct lookups and resolves free-text menu queries.
 */
@Module({
  imports: [],
  providers: [CatalogService, CatalogResolverService],
  exports: [CatalogService, CatalogResolverService],
})
export class CatalogModule {}
