import { UnknownRouteError } from '../errors.js';
import type { QueueBinding } from './types.js';

export class RouteTable {
  private readonly routes = new Map<string, Map<string, string>>();

  static fromBindings(bindings: Iterable<QueueBinding>): RouteTable {
    const table = new RouteTable();
    for (const binding of bindings) {
      table.set(binding.exchange.name, binding.routing_key, binding.name);
    }
    return table;
  }

  // Last write wins.
  set(exchange: string, routingKey: string, queue: string): void {
    let byKey = this.routes.get(exchange);
    if (!byKey) {
      byKey = new Map<string, string>();
      this.routes.set(exchange, byKey);
    }
    byKey.set(routingKey, queue);
  }

  resolve(exchange: string, routingKey: string): string {
    const queue = this.routes.get(exchange)?.get(routingKey);
    if (queue === undefined) {
      throw new UnknownRouteError(exchange, routingKey);
    }
    return queue;
  }

  get size(): number {
    let total = 0;
    for (const byKey of this.routes.values()) {
      total += byKey.size;
    }
    return total;
  }

  toJSON(): Array<{ exchange: string; routingKey: string; queue: string }> {
    const entries: Array<{ exchange: string; routingKey: string; queue: string }> = [];
    for (const [exchange, byKey] of this.routes) {
      for (const [routingKey, queue] of byKey) {
        entries.push({ exchange, routingKey, queue });
      }
    }
    return entries;
  }
}
