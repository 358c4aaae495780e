import { ORDER_EVENT, ORDER_STATUS, OrderEvent, OrderStatus } from '../../constants';
import type { OrderTimestampField } from '../../connections/db/models';
import { InvalidTransitionError } from '../../utils/errors';

type TransitionTable = Record<OrderStatus, Partial<Record<OrderEvent, OrderStatus>>>;

/**
 * (current status, event) -> next status. Anything not listed is illegal.
 */
export const ORDER_TRANSITIONS: TransitionTable = {
  [ORDER_STATUS.PENDING]: {
    [ORDER_EVENT.PAY]: ORDER_STATUS.PAID,
    [ORDER_EVENT.START_PROCESSING]: ORDER_STATUS.PROCESSING,
    [ORDER_EVENT.CANCEL]: ORDER_STATUS.CANCELLED,
  },
  [ORDER_STATUS.PAID]: {
    [ORDER_EVENT.START_PROCESSING]: ORDER_STATUS.PROCESSING,
    [ORDER_EVENT.CANCEL]: ORDER_STATUS.CANCELLED,
    [ORDER_EVENT.REFUND]: ORDER_STATUS.REFUNDED,
  },
  [ORDER_STATUS.PROCESSING]: {
    [ORDER_EVENT.SHIP]: ORDER_STATUS.SHIPPED,
    [ORDER_EVENT.CANCEL]: ORDER_STATUS.CANCELLED,
  },
  [ORDER_STATUS.SHIPPED]: {
    [ORDER_EVENT.DELIVER]: ORDER_STATUS.DELIVERED,
    [ORDER_EVENT.RETURN]: ORDER_STATUS.RETURNED,
  },
  [ORDER_STATUS.DELIVERED]: {
    [ORDER_EVENT.COMPLETE]: ORDER_STATUS.COMPLETED,
    [ORDER_EVENT.RETURN]: ORDER_STATUS.RETURNED,
  },
  [ORDER_STATUS.COMPLETED]: {
    [ORDER_EVENT.RETURN]: ORDER_STATUS.RETURNED,
  },
  [ORDER_STATUS.CANCELLED]: {
    [ORDER_EVENT.REFUND]: ORDER_STATUS.REFUNDED,
  },
  [ORDER_STATUS.RETURNED]: {
    [ORDER_EVENT.REFUND]: ORDER_STATUS.REFUNDED,
  },
  [ORDER_STATUS.REFUNDED]: {},
};

/**
 * The forward fulfillment track shipments drive orders along.
 */
export const FULFILLMENT_TRACK: readonly OrderStatus[] = [
  ORDER_STATUS.PENDING,
  ORDER_STATUS.PAID,
  ORDER_STATUS.PROCESSING,
  ORDER_STATUS.SHIPPED,
  ORDER_STATUS.DELIVERED,
  ORDER_STATUS.COMPLETED,
];

export const STATUS_TIMESTAMPS: Partial<Record<OrderStatus, OrderTimestampField>> = {
  [ORDER_STATUS.PAID]: 'paid_at',
  [ORDER_STATUS.SHIPPED]: 'shipped_at',
  [ORDER_STATUS.DELIVERED]: 'delivered_at',
  [ORDER_STATUS.CANCELLED]: 'cancelled_at',
};

const edgesFrom = (status: OrderStatus): Array<[OrderEvent, OrderStatus]> => {
  const edges: Array<[OrderEvent, OrderStatus]> = [];
  for (const event of Object.values(ORDER_EVENT)) {
    const target = ORDER_TRANSITIONS[status][event];
    if (target) {
      edges.push([event, target]);
    }
  }
  return edges;
};

export const nextStatus = (from: OrderStatus, event: OrderEvent): OrderStatus | null =>
  ORDER_TRANSITIONS[from][event] ?? null;

/**
 * The event that moves `from` to `to` in one step, if any.
 */
export const eventFor = (from: OrderStatus, to: OrderStatus): OrderEvent | null => {
  const edge = edgesFrom(from).find(([, target]) => target === to);
  return edge ? edge[0] : null;
};

export const canTransition = (from: OrderStatus, to: OrderStatus): boolean => eventFor(from, to) !== null;

export const assertTransition = (from: OrderStatus, to: OrderStatus): OrderEvent => {
  const event = eventFor(from, to);
  if (!event) {
    throw new InvalidTransitionError('order', from, to);
  }
  return event;
};

export const fireEvent = (from: OrderStatus, event: OrderEvent): OrderStatus => {
  const target = nextStatus(from, event);
  if (!target) {
    throw new InvalidTransitionError('order', from, `${event} event`);
  }
  return target;
};

export const trackPosition = (status: OrderStatus): number => FULFILLMENT_TRACK.indexOf(status);

/**
 * Statuses to step through, in order, to bring `from` up to `target` along
 * the fulfillment track. Empty when the order is already at or past the
 * target; throws when the order has left the track.
 */
export const planPromotion = (from: OrderStatus, target: OrderStatus): OrderStatus[] => {
  const fromPosition = trackPosition(from);
  const targetPosition = trackPosition(target);

  if (targetPosition < 0) {
    throw new InvalidTransitionError('order', from, target);
  }
  if (fromPosition < 0) {
    throw new InvalidTransitionError('order', from, target);
  }
  if (fromPosition >= targetPosition) {
    return [];
  }

  // Breadth-first over forward edges that stay on the track
  const previous = new Map<OrderStatus, OrderStatus>();
  const queue: OrderStatus[] = [from];
  const visited = new Set<OrderStatus>([from]);

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || current === target) {
      break;
    }
    for (const [, next] of edgesFrom(current)) {
      const nextPosition = trackPosition(next);
      if (nextPosition <= trackPosition(current) || nextPosition > targetPosition || visited.has(next)) {
        continue;
      }
      visited.add(next);
      previous.set(next, current);
      queue.push(next);
    }
  }

  if (!visited.has(target)) {
    throw new InvalidTransitionError('order', from, target);
  }

  const path: OrderStatus[] = [];
  let step: OrderStatus | undefined = target;
  while (step !== undefined && step !== from) {
    path.unshift(step);
    step = previous.get(step);
  }
  return path;
};
