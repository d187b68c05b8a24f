/**
 * Engine output: signal/event records for the host and the command type consumed by execution.
 */

export type TradeSide = 'long' | 'short';

export type ExitReason =
  | 'stop'
  | 'breakeven-stop'
  | 'trailing-stop'
  | 'target'
  | 'time-stop'
  | 'no-progress'
  | 'partial-full-close'
  | 'end-of-day';

export type EngineEventKind =
  | 'zone-created'
  | 'zone-invalidated'
  | 'swing-confirmed'
  | 'daily-reset'
  | 'pending-set'
  | 'pending-timeout'
  | 'pending-cancelled'
  | 'entry-long'
  | 'entry-short'
  | 'breakeven-set'
  | 'partial-exit'
  | 'trailing-activated'
  | 'exit';

export interface EngineEvent {
  kind: EngineEventKind;
  barIndex: number;
  price: number;
  /** Human-readable tag: model or zone kind plus bounds */
  tag: string;
}

export type EngineCommand =
  | { type: 'open'; side: TradeSide; quantity: number; price: number }
  | { type: 'partial-close'; quantity: number; price: number }
  | { type: 'close-all'; reason: ExitReason; price: number };

export function formatPrice(price: number): string {
  return price.toFixed(2);
}

export function formatBounds(bottom: number, top: number): string {
  return `${formatPrice(bottom)}-${formatPrice(top)}`;
}
