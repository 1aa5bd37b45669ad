/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A record of event names and the argument tuple each event is emitted with.
 * Declare it as a `type` alias (interfaces do not satisfy the index signature).
 */
export type EventMap = Record<string, unknown[]>;

/**
 * A listener function for one event of an event map.
 * @template Events - A record of event names and their argument tuples
 * @template Event - The name of the event
 */
export type EventListener<Events extends EventMap, Event extends keyof Events> = (
  ...args: Events[Event]
) => void;

type EventListeners<Events extends EventMap, Event extends keyof Events> = Array<{
  listener: EventListener<Events, Event>;
  once?: boolean;
}>;

/**
 * A class that implements an event emitter pattern.
 * @template Events - A record of event names and their argument tuples
 */
export class EventEmitter<Events extends EventMap> {
  private listeners: {
    [Event in keyof Events]?: EventListeners<Events, Event>;
  } = {};

  /**
   * Remove all listeners for a specific event or all events
   * @param event - Optional event name. If not provided, removes all listeners for all events
   * @returns this, so that calls can be chained
   */
  removeAllListeners<Event extends keyof Events>(event?: Event): this {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
    return this;
  }

  /**
   * Adds a listener function for the event
   * @returns this, so that calls can be chained
   */
  on<Event extends keyof Events>(event: Event, listener: EventListener<Events, Event>): this {
    const listeners: EventListeners<Events, Event> =
      this.listeners[event] || (this.listeners[event] = []);
    listeners.push({ listener });
    return this;
  }

  /**
   * Removes a listener function for the event
   * @returns this, so that calls can be chained
   */
  off<Event extends keyof Events>(event: Event, listener: EventListener<Events, Event>): this {
    const listeners = this.listeners[event];
    if (!listeners) return this;

    const index = listeners.findIndex((l) => l.listener === listener);
    if (index >= 0) {
      listeners.splice(index, 1);
    }
    return this;
  }

  /**
   * Adds a listener function for the event that will be called only once
   * @returns this, so that calls can be chained
   */
  once<Event extends keyof Events>(event: Event, listener: EventListener<Events, Event>): this {
    const listeners: EventListeners<Events, Event> =
      this.listeners[event] || (this.listeners[event] = []);
    listeners.push({ listener, once: true });
    return this;
  }

  /**
   * Emits an event with the specified name and arguments
   * @param event - The event name to emit
   * @param args - Arguments to pass to the event listeners
   */
  public emit<Event extends keyof Events>(event: Event, ...args: Events[Event]): void {
    const listeners: EventListeners<Events, Event> | undefined = this.listeners[event];
    if (listeners) {
      listeners.forEach(({ listener }) => {
        listener(...args);
      });
      // Remove once listeners we just called
      this.listeners[event] = listeners.filter((l) => !l.once);
    }
  }

  /**
   * Subscribes to an event and returns a function to unsubscribe
   * @returns a function to unsubscribe from the event
   */
  public subscribe<Event extends keyof Events>(
    event: Event,
    listener: EventListener<Events, Event>
  ): () => void {
    this.on(event, listener);
    return () => this.off(event, listener);
  }
}
