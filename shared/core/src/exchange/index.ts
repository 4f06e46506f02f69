export { GuardedExchangeClient, resolveLimitKey } from './guarded-client';
export type {
  GuardedCallOptions,
  GuardedClientStats,
  GuardedExchangeClientDeps,
  ResponseSchema,
} from './guarded-client';
