/**
 * Execution Bridge
 * Feeds bars to the engine and forwards its commands to an execution gateway.
 * Order calls are fire-and-forget; the gateway fills at its last price.
 */

import type { Bar } from '../modules/smartMoney/types.js';
import type { BarResult, DecisionEngine, EngineState } from '../engine/decisionEngine.js';
import type { EngineCommand } from '../engine/events.js';
import { createLogger } from './logger.js';

const logger = createLogger('ExecutionBridge');

export interface ExecutionGateway {
  openLong(qty: number): void;
  openShort(qty: number): void;
  closeAll(): void;
  partialClose(qty: number): void;
  /** Signed quantity: positive long, negative short, zero flat */
  currentPosition(): number;
  roundToTick(price: number): number;
  lastPrice(): number;
}

export class ExecutionBridge {
  private state: EngineState;

  constructor(
    private readonly engine: DecisionEngine,
    private readonly gateway: ExecutionGateway
  ) {
    this.state = engine.initialState();
  }

  onBar(bar: Bar): BarResult {
    const result = this.engine.processBar(this.state, bar);
    this.state = result.state;

    for (const command of result.commands) {
      this.apply(command);
    }

    if (result.commands.length > 0) {
      this.reconcile();
    }

    return result;
  }

  getState(): EngineState {
    return this.state;
  }

  private apply(command: EngineCommand): void {
    switch (command.type) {
      case 'open':
        if (command.side === 'long') {
          this.gateway.openLong(command.quantity);
        } else {
          this.gateway.openShort(command.quantity);
        }
        break;
      case 'partial-close':
        this.gateway.partialClose(command.quantity);
        break;
      case 'close-all':
        this.gateway.closeAll();
        break;
      default: {
        const unhandled: never = command;
        throw new Error(`Unhandled engine command: ${JSON.stringify(unhandled)}`);
      }
    }

    logger.debug(`Applied ${command.type}`, {
      position: this.gateway.currentPosition(),
      lastPrice: this.gateway.lastPrice(),
    });
  }

  private reconcile(): void {
    const trade = this.state.trade;
    const expected = trade === null
      ? 0
      : trade.side === 'long' ? trade.remainingQuantity : -trade.remainingQuantity;
    const actual = this.gateway.currentPosition();

    if (expected !== actual) {
      logger.warn('Gateway position differs from engine trade', { expected, actual });
    }
  }
}
