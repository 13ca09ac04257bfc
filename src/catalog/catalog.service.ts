import * as path from 'path';

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { OrderError } from '../common/errors/order-error';
import { AR } from '../common/messages/ar';
import { readJsonFile } from '../common/utils/read-json';

import { CatalogItem, validateCatalog } from './catalog.schema';
import { CatalogLookup } from './interfaces';

/**
 * Catalog Index.
 * Menu items are loaded once from the configured JSON file and never change afterwards.
 */
@Injectable()
export class CatalogService implements CatalogLookup, OnModuleInit {
  private readonly logger = new Logger(CatalogService.name);
  private readonly catalogPath: string;

  /** Items in file order; order is the tie-break for search results */
  private items: readonly CatalogItem[] = [];
  private byId: Map<string, CatalogItem> = new Map();

  constructor(private readonly configService: ConfigService) {
    this.catalogPath = this.configService.get<string>('paths.catalog', './data/menu.json');
  }

  async onModuleInit() {
    await this.load();
  }

  /**
   * Load and validate the menu file.
   * Throws when the file is missing or invalid.
   */
  async load(): Promise<CatalogItem[]> {
    const resolvedPath = path.resolve(this.catalogPath);
    this.logger.log(`Loading menu from ${resolvedPath}`);

    const data = await readJsonFile(resolvedPath);
    if (data === null) {
      throw new Error(`Menu file not found: ${resolvedPath}`);
    }

    const items = validateCatalog(data, path.basename(resolvedPath));
    this.items = Object.freeze([...items]);
    this.byId = new Map(items.map((item) => [item.id, item]));

    this.logger.log(`Loaded ${items.length} menu items from ${resolvedPath}`);
    return items;
  }

  /**
   * All items in catalog order.
   */
  getAll(): readonly CatalogItem[] {
    return this.items;
  }

  getById(id: string): CatalogItem | undefined {
    return this.byId.get(id);
  }

  /**
   * Direct lookup used by ledger operations; absence is `ItemNotFound`.
   */
  require(id: string): CatalogItem {
    const item = this.byId.get(id);
    if (!item) {
      throw new OrderError('ItemNotFound', AR.ITEM_NOT_FOUND, { itemId: id });
    }
    return item;
  }
}
