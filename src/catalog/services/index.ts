export * from './catalog-resolver.service';
