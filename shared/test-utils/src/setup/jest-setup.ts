// Loaded through Jest `setupFiles`, before any test module imports a logger.
import { setupTestEnv } from './env-setup';

setupTestEnv();
