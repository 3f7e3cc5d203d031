import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type TelemetryContext = {
  traceId: string;
  tool: string;
  loanId?: string;
};

const storage = new AsyncLocalStorage<TelemetryContext>();

export function createTraceId(): string {
  return randomUUID();
}

export function runWithTelemetry<T>(ctx: TelemetryContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

export function getTelemetry(): TelemetryContext | undefined {
  return storage.getStore();
}

export function getTraceId(): string | undefined {
  return storage.getStore()?.traceId;
}
