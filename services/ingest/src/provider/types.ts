import type { PayloadFormat, SubRequest } from '../requests/expansion';

export interface RawPayload {
  readonly subRequest: SubRequest;
  readonly format: PayloadFormat;
  readonly contentType: string | null;
  readonly body: string;
  /** The provider answered that the period legitimately has no data. */
  readonly noData: boolean;
}

export interface ProviderClient {
  fetch(subRequest: SubRequest, signal?: AbortSignal): Promise<RawPayload>;
}

export interface ReadinessCheck {
  isReady(): Promise<boolean>;
}
