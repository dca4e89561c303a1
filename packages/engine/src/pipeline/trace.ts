/**
 * Trace collector for debugging generation runs.
 *
 * Records what each phase picked and why, so a failed or surprising route can
 * be explained after the fact. Disabled collectors record nothing.
 */

import type { GenerationPhase } from "@routesetter/contracts";

export type TraceScope = GenerationPhase | "route";

interface TraceEventBase {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  readonly scope: TraceScope;
}

export interface StartEvent extends TraceEventBase {
  readonly eventType: "start";
}

export interface EndEvent extends TraceEventBase {
  readonly eventType: "end";
  readonly data: { readonly durationMs: number };
}

/**
 * "Explain why" record for a single pick
 */
export interface DecisionEvent extends TraceEventBase {
  readonly eventType: "decision";
  readonly data: {
    readonly question: string;
    /** Size of the pool the pick was drawn from */
    readonly candidates: number;
    readonly chosen: unknown;
    readonly reason: string;
  };
}

export interface WarningEvent extends TraceEventBase {
  readonly eventType: "warning";
  readonly data: { readonly message: string };
}

export type TraceEvent = StartEvent | EndEvent | DecisionEvent | WarningEvent;

export interface TraceCollector {
  readonly enabled: boolean;
  start(scope: TraceScope): void;
  end(scope: TraceScope, durationMs: number): void;
  decision(
    scope: TraceScope,
    question: string,
    candidates: number,
    chosen: unknown,
    reason: string,
  ): void;
  warning(scope: TraceScope, message: string): void;
  getEvents(): readonly TraceEvent[];
}

/**
 * Default trace collector implementation
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private now(): number {
    return performance.now() - this.startTime;
  }

  start(scope: TraceScope): void {
    if (!this.enabled) return;
    this.events.push({ timestamp: this.now(), scope, eventType: "start" });
  }

  end(scope: TraceScope, durationMs: number): void {
    if (!this.enabled) return;
    this.events.push({
      timestamp: this.now(),
      scope,
      eventType: "end",
      data: { durationMs },
    });
  }

  decision(
    scope: TraceScope,
    question: string,
    candidates: number,
    chosen: unknown,
    reason: string,
  ): void {
    if (!this.enabled) return;
    this.events.push({
      timestamp: this.now(),
      scope,
      eventType: "decision",
      data: { question, candidates, chosen, reason },
    });
  }

  warning(scope: TraceScope, message: string): void {
    if (!this.enabled) return;
    this.events.push({
      timestamp: this.now(),
      scope,
      eventType: "warning",
      data: { message },
    });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }
}

/**
 * Create a trace collector based on configuration
 */
export function createTraceCollector(enabled: boolean): TraceCollector {
  return new DefaultTraceCollector(enabled);
}
