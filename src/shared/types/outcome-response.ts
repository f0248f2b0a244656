import type { Outcome } from './outcome';

/** Envelope returned by HTTP and TCP handlers */
export interface OutcomeResponse<T> {
  success: boolean;
  status: Outcome<T>['status'];
  data?: T;
  note?: string;
  error?: string;
}

export function toResponse<T>(outcome: Outcome<T>): OutcomeResponse<T> {
  switch (outcome.status) {
    case 'ok':
      return { success: true, status: 'ok', data: outcome.value };
    case 'degraded':
      return {
        success: true,
        status: 'degraded',
        data: outcome.value,
        note: outcome.reason,
      };
    case 'failed':
      return { success: false, status: 'failed', error: outcome.error.message };
  }
}
