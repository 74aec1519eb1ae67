/**
 * Business-level failure for a single work item. The worker catches it,
 * logs it and hands the item to manual review; the message is shown to
 * caseworkers as-is.
 */
export class WorkItemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkItemError';
  }
}

/** Non-2xx answer from Momentum other than 404. */
export class MomentumHttpError extends Error {
  readonly status: number;
  readonly path: string;

  constructor(status: number, path: string, detail?: string) {
    super(`Momentum ${path} returned ${status}${detail ? `: ${detail}` : ''}`);
    this.name = 'MomentumHttpError';
    this.status = status;
    this.path = path;
  }
}

/** Momentum answered 2xx with a body we could not read. */
export class MomentumResponseError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Unexpected response from Momentum ${path}: ${detail}`);
    this.name = 'MomentumResponseError';
    this.path = path;
  }
}

export function isTransientHttpError(err: unknown): boolean {
  return err instanceof MomentumHttpError;
}
