export * from './errors';
export * from './datasets/kinds';
export * from './datasets/schemas';
export * from './datasets/table';
export * from './datasets/codec';
export * from './partitions/calendar';
export * from './partitions/keys';
export * from './requests/logicalRequest';
export * from './requests/expansion';
export { normalize } from './normalizers/router';
export * from './jobs/tracker';
export * from './dispatch/workerPool';
export * from './dispatch/dispatcher';
export * from './retrieval/scanner';
export * from './provider/types';
export { HttpProviderClient, NO_DATA_STATUS, isTransientStatus } from './provider/httpProvider';
export type { HttpProviderOptions } from './provider/httpProvider';
export { ReadinessProbe } from './provider/readiness';
export type { ReadinessProbeOptions } from './provider/readiness';
export * from './storage/objectStore';
export { loadServiceConfig } from './config/serviceConfig';
export type { LogLevel, ServiceConfig } from './config/serviceConfig';
export { createRuntime } from './runtime';
export type { IngestRuntime, RuntimeOverrides } from './runtime';
export { createApp } from './app';
