export type TraceOutcome = 'ok' | 'fallback' | 'failed';

export type TraceEvent = {
  gate: string;
  outcome: TraceOutcome;
  reason_code?: string;
  meta?: Record<string, unknown>;
  at: string;
};

export type PipelineObserver = {
  onEvent(event: TraceEvent): void;
};

export type TraceSink = {
  trace?: TraceEvent[];
  observer?: PipelineObserver;
};

export function pushTrace(
  sink: TraceSink | undefined,
  event: Omit<TraceEvent, 'at'> & { at?: string },
): void {
  if (!sink || (!sink.trace && !sink.observer)) return;
  const stamped: TraceEvent = {
    ...event,
    at: event.at ?? new Date().toISOString(),
  };
  sink.trace?.push(stamped);
  sink.observer?.onEvent(stamped);
}

export type TraceCounters = PipelineObserver & {
  counts(): Record<string, number>;
  get(gate: string, outcome: TraceOutcome): number;
};

/**
 * Observer that tallies events by `gate:outcome`, and by `gate:reason_code`
 * when a reason is present (e.g. `generation.parse:malformed_response`).
 */
export function createTraceCounters(): TraceCounters {
  const tally = new Map<string, number>();
  const bump = (key: string) => tally.set(key, (tally.get(key) ?? 0) + 1);

  return {
    onEvent(event) {
      bump(`${event.gate}:${event.outcome}`);
      if (event.reason_code) bump(`${event.gate}:${event.reason_code}`);
    },
    counts() {
      return Object.fromEntries(tally);
    },
    get(gate, outcome) {
      return tally.get(`${gate}:${outcome}`) ?? 0;
    },
  };
}

/** Fan one event out to several observers. */
export function combineObservers(...observers: Array<PipelineObserver | undefined>): PipelineObserver {
  const active = observers.filter((entry): entry is PipelineObserver => Boolean(entry));
  return {
    onEvent(event) {
      active.forEach((observer) => observer.onEvent(event));
    },
  };
}
