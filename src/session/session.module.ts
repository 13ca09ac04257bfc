import { Module } from '@nestjs/common';

import { CatalogModule } from '../catalog/catalog.module';

import { SESSION_STORE } from './interfaces';
import { InMemorySessionStore, SessionLockService, SessionSweeperService } from './services';

/**
 * Session Module
 *
 * Owns the session registry, per-session turn locking and the inactivity sweep.
 * Bind another `ISessionStore` to `SESSION_STORE` for durable sessions.
 */
@Module({
  imports: [CatalogModule],
  providers: [
    InMemorySessionStore,
    {
      provide: SESSION_STORE,
      useExisting: InMemorySessionStore,
    },
    SessionLockService,
    SessionSweeperService,
  ],
  exports: [SESSION_STORE, SessionLockService],
})
export class SessionModule {}
