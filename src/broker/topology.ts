import { QueueName, RoutingKey } from '../events/schemas';

export type QueueBinding = { routingKey: string; queue: string };

export type Topology = {
  exchanges: Array<{ name: string; bindings: QueueBinding[] }>;
};

export function deadLetterQueueName(queue: string): string {
  return `${queue}.dead-letter`;
}

export function buildPipelineTopology(exchange: string): Topology {
  return {
    exchanges: [
      {
        name: exchange,
        bindings: [
          { routingKey: RoutingKey.INGESTED, queue: QueueName.INGESTED },
          { routingKey: RoutingKey.EXTRACTED, queue: QueueName.EXTRACTED },
          { routingKey: RoutingKey.MATCHED, queue: QueueName.MATCHED },
          { routingKey: RoutingKey.APPROVED, queue: QueueName.APPROVED },
          { routingKey: RoutingKey.POSTED, queue: QueueName.POSTED },
        ],
      },
    ],
  };
}

/** Resolves `exchange + routingKey` to the queues bound to it. */
export function resolveBindings(topology: Topology, exchange: string, routingKey: string): string[] {
  const ex = topology.exchanges.find((e) => e.name === exchange);
  if (!ex) return [];
  return ex.bindings.filter((b) => b.routingKey === routingKey).map((b) => b.queue);
}

export function declaredQueues(topology: Topology): string[] {
  const names = new Set<string>();
  for (const ex of topology.exchanges) {
    for (const b of ex.bindings) names.add(b.queue);
  }
  return [...names];
}
