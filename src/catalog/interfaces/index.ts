export * from './catalog-lookup.interface';
export * from './search-result.interface';
