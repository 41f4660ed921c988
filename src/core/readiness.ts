export interface ReadinessStatus {
  ready: boolean;
  status: string;
}

/**
 * Reports whether the gateway may execute commands yet.
 */
export interface ReadinessProvider {
  status(): ReadinessStatus;
}

export interface Readiness extends ReadinessProvider {
  setStatus(text: string): void;
  finishWarmup(): void;
}

export function createReadiness(options: { ready?: boolean; status?: string } = {}): Readiness {
  let ready = options.ready ?? false;
  let statusText = options.status ?? 'RPC server started';

  return {
    status: () => ({ ready, status: statusText }),
    setStatus(text) {
      statusText = text;
    },
    finishWarmup() {
      ready = true;
      statusText = 'Done loading';
    },
  };
}
