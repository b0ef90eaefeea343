import type { EventBus, RelayEvent } from '../core/EventBus.js';
import { errorMessage } from '../core/errors.js';

/**
 * 配送先 1 件 (WebSocket クライアント、OSC ブリッジなど)。
 * 実体は各アダプタが所有し、Broadcaster は登録だけを持つ
 */
export interface Subscriber {
  readonly id: string;
  deliver(event: RelayEvent): Promise<void> | void;
  isOpen(): boolean;
}

interface Registration {
  subscriber: Subscriber;
  queue: RelayEvent[];
  capacity: number;
  dropped: number;
  pumping: Promise<void> | null;
}

/**
 * イベントを全購読者へ配る。購読者ごとに上限付きキューを持ち、
 * 溢れたら一番古いイベントを捨てる。遅い購読者が他を待たせることはない
 */
export class Broadcaster {
  private registrations = new Map<string, Registration>();
  private detach: (() => void) | null = null;

  constructor(private defaultQueueSize: number) {}

  attach(bus: EventBus): void {
    if (this.detach) return;
    this.detach = bus.subscribe((event) => this.publish(event));
  }

  register(subscriber: Subscriber, queueSize = this.defaultQueueSize): void {
    this.registrations.set(subscriber.id, {
      subscriber,
      queue: [],
      capacity: Math.max(1, queueSize),
      dropped: 0,
      pumping: null,
    });
    console.log(`[Broadcaster] Registered ${subscriber.id}. Total: ${this.registrations.size}`);
  }

  unregister(id: string, reason = 'unregistered'): void {
    const registration = this.registrations.get(id);
    if (!registration) return;
    this.registrations.delete(id);
    registration.queue.length = 0;
    console.log(`[Broadcaster] Removed ${id} (${reason}). Total: ${this.registrations.size}`);
  }

  get size(): number {
    return this.registrations.size;
  }

  publish(event: RelayEvent): void {
    for (const registration of this.registrations.values()) {
      if (registration.queue.length >= registration.capacity) {
        registration.queue.shift();
        registration.dropped++;
        if (registration.dropped === 1 || registration.dropped % 100 === 0) {
          console.warn(`[Broadcaster] ${registration.subscriber.id} is falling behind (${registration.dropped} dropped)`);
        }
      }
      registration.queue.push(event);
      this.pump(registration);
    }
  }

  /** キューが空になるまで待つ */
  async idle(): Promise<void> {
    const pending = [...this.registrations.values()]
      .map((r) => r.pumping)
      .filter((p): p is Promise<void> => p !== null);
    await Promise.all(pending);
  }

  close(): void {
    this.detach?.();
    this.detach = null;
    for (const id of [...this.registrations.keys()]) {
      this.unregister(id, 'shutdown');
    }
  }

  private pump(registration: Registration): void {
    if (registration.pumping) return;
    registration.pumping = this.drain(registration).finally(() => {
      registration.pumping = null;
      // drain 終了直後に積まれた分
      if (registration.queue.length > 0 && this.registrations.get(registration.subscriber.id) === registration) {
        this.pump(registration);
      }
    });
  }

  private async drain(registration: Registration): Promise<void> {
    const { subscriber } = registration;
    while (registration.queue.length > 0) {
      if (this.registrations.get(subscriber.id) !== registration) return;
      if (!subscriber.isOpen()) {
        this.unregister(subscriber.id, 'transport closed');
        return;
      }

      const event = registration.queue.shift();
      if (!event) return;
      try {
        await subscriber.deliver(event);
      } catch (err) {
        this.unregister(subscriber.id, `delivery failed: ${errorMessage(err)}`);
        return;
      }
    }
  }
}
