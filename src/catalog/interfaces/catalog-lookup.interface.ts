import { CatalogItem } from '../catalog.schema';

/**
 * Read-only view of the Catalog Index used by order lines.
 */
export interface CatalogLookup {
  getById(id: string): CatalogItem | undefined;
}
