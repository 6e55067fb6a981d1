// pattern: Functional Core
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { CycleScheduler } from "../scheduler";
import type { CycleLog } from "../store/cycles";
import type { ItemStore } from "../store/items";
import type { SourceRegistry } from "../store/sources";

/**
 * Services shared by every request: stores, the scheduler's control port,
 * configuration, logger and the configured admin token.
 */
export type AppServices = {
  readonly items: ItemStore;
  readonly cycles: CycleLog;
  readonly sources: SourceRegistry;
  readonly scheduler: CycleScheduler;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly adminToken: string | null;
};

/**
 * tRPC context passed to all procedures: the shared services plus the bearer
 * token presented with the current request, if any.
 */
export type AppContext = AppServices & {
  readonly requestToken: string | null;
};
