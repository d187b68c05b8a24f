/**
 * Paper Gateway
 * In-memory execution gateway that fills every order at the last marked price.
 */

import type { ExecutionGateway } from './executionBridge.js';
import { roundToTick } from '../utils/math.js';

export type FillAction = 'open-long' | 'open-short' | 'partial-close' | 'close-all';

export interface Fill {
  action: FillAction;
  quantity: number;
  price: number;
  positionAfter: number;
}

export class PaperGateway implements ExecutionGateway {
  private position = 0;
  private price = 0;
  private readonly fills: Fill[] = [];

  constructor(private readonly tickSize: number) {}

  /** Update the price subsequent fills use */
  mark(price: number): void {
    this.price = price;
  }

  openLong(qty: number): void {
    this.position += qty;
    this.record('open-long', qty);
  }

  openShort(qty: number): void {
    this.position -= qty;
    this.record('open-short', qty);
  }

  closeAll(): void {
    const qty = Math.abs(this.position);
    this.position = 0;
    this.record('close-all', qty);
  }

  partialClose(qty: number): void {
    const closing = Math.min(qty, Math.abs(this.position));
    this.position -= Math.sign(this.position) * closing;
    this.record('partial-close', closing);
  }

  currentPosition(): number {
    return this.position;
  }

  roundToTick(price: number): number {
    return roundToTick(price, this.tickSize);
  }

  lastPrice(): number {
    return this.price;
  }

  getFills(): readonly Fill[] {
    return this.fills;
  }

  private record(action: FillAction, quantity: number): void {
    this.fills.push({ action, quantity, price: this.price, positionAfter: this.position });
  }
}
