import type { ServiceConfig } from './config/serviceConfig';
import type { FanoutDispatcher } from './dispatch/dispatcher';
import type { IngestMetrics } from './metrics';
import type { ReadinessCheck } from './provider/types';
import type { RetrievalScanner } from './retrieval/scanner';

export interface AppContext {
  config: ServiceConfig;
  dispatcher: FanoutDispatcher;
  scanner: RetrievalScanner;
  readiness: ReadinessCheck;
  metrics: IngestMetrics;
}
