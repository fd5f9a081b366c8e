/**
 * BusEvent - event object handed to bus listeners
 */

export class BusEvent<T = unknown> {
  /**
   * Event name
   */
  readonly name: string;

  /**
   * Event payload
   */
  readonly data: T;

  /**
   * Event creation timestamp (milliseconds since epoch)
   */
  readonly timestamp: number;

  constructor(name: string, data: T, timestamp: number = Date.now()) {
    this.name = name;
    this.data = data;
    this.timestamp = timestamp;
  }
}
