export interface RawButtonEvent {
  buttonId: number; // Button index on the device (0, 1, ...)
  pressed: boolean;
  /**
   * Host wall clock in epoch ms, the same clock as `Date.now()`.
   * Long press timing is counted from this instant.
   */
  timestamp: number;
}

export const createButtonEvent = (
  buttonId: number,
  pressed: boolean,
  timestamp: number = Date.now(),
): RawButtonEvent => ({ buttonId, pressed, timestamp });
