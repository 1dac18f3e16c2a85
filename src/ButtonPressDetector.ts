import {
  Gesture,
  doublePressGesture,
  longPressGesture,
  pressGesture,
} from "./model/gesture.js";
import { GestureTiming } from "./model/gestureTiming.js";

type ButtonState =
  | "IDLE"
  | "PRESSED"
  | "WAITING_FOR_DOUBLE"
  | "DOUBLE_PRESSED"
  | "LONG_PRESS_ACTIVE";

interface ButtonContext {
  state: ButtonState;
  pressedAt: number;
  longPressTimer: ReturnType<typeof setTimeout> | null;
  doublePressTimer: ReturnType<typeof setTimeout> | null;
}

export type DetectorTiming = Pick<
  GestureTiming,
  "doublePressWindowMs" | "longPressThresholdMs"
>;

/**
 * Classifies each button's own press/release timeline into
 * PRESS, DOUBLE_PRESS or LONG_PRESS.
 *
 * LONG_PRESS is timer driven and fires while the button is still held,
 * the other two are decided once the button is released.
 */
export class ButtonPressDetector {
  private buttons = new Map<number, ButtonContext>();
  private timing: DetectorTiming;
  private stopped = false;

  constructor(
    timing: DetectorTiming,
    private readonly onGesture: (gesture: Gesture) => void,
  ) {
    this.timing = { ...timing };
  }

  /**
   * Applies to timers armed after the call
   */
  updateTiming(timing: DetectorTiming) {
    this.timing = { ...timing };
  }

  isWaitingForDouble(button: number): boolean {
    return this.buttons.get(button)?.state === "WAITING_FOR_DOUBLE";
  }

  isPressed(button: number): boolean {
    const state = this.buttons.get(button)?.state;
    return (
      state === "PRESSED" ||
      state === "DOUBLE_PRESSED" ||
      state === "LONG_PRESS_ACTIVE"
    );
  }

  /**
   * @param at - When the button went down, defaults to now. The long press
   * threshold is counted from this instant.
   */
  handlePress(button: number, at: number = Date.now()) {
    if (this.stopped) {
      return;
    }
    const ctx = this.getContext(button);

    switch (ctx.state) {
      case "IDLE": {
        this.clearTimers(ctx);
        ctx.state = "PRESSED";
        ctx.pressedAt = at;
        const heldMs = this.heldSince(at);
        ctx.longPressTimer = setTimeout(
          () => {
            ctx.longPressTimer = null;
            if (this.stopped || ctx.state !== "PRESSED") {
              return;
            }
            ctx.state = "LONG_PRESS_ACTIVE";
            this.onGesture(longPressGesture(button));
          },
          Math.max(0, this.timing.longPressThresholdMs - heldMs),
        );
        break;
      }
      case "WAITING_FOR_DOUBLE": {
        this.clearTimers(ctx);
        ctx.state = "DOUBLE_PRESSED";
        ctx.pressedAt = at;
        break;
      }
      default:
        // Repeated press while down
        break;
    }
  }

  handleRelease(button: number, at: number = Date.now()) {
    if (this.stopped) {
      return;
    }
    const ctx = this.getContext(button);

    switch (ctx.state) {
      case "PRESSED": {
        this.clearTimers(ctx);
        if (at - ctx.pressedAt >= this.timing.longPressThresholdMs) {
          // Held for the full threshold, the long press wins even though its timer has not run yet
          ctx.state = "IDLE";
          this.onGesture(longPressGesture(button));
          break;
        }
        ctx.state = "WAITING_FOR_DOUBLE";
        ctx.doublePressTimer = setTimeout(() => {
          ctx.doublePressTimer = null;
          if (this.stopped || ctx.state !== "WAITING_FOR_DOUBLE") {
            return;
          }
          ctx.state = "IDLE";
          this.onGesture(pressGesture(button));
        }, this.timing.doublePressWindowMs);
        break;
      }
      case "DOUBLE_PRESSED": {
        this.clearTimers(ctx);
        ctx.state = "IDLE";
        this.onGesture(doublePressGesture(button));
        break;
      }
      case "LONG_PRESS_ACTIVE": {
        this.clearTimers(ctx);
        ctx.state = "IDLE";
        break;
      }
      default:
        // Release without a matching press
        break;
    }
  }

  /**
   * Drop the button's current press cycle without emitting anything
   */
  cancel(button: number) {
    const ctx = this.buttons.get(button);
    if (!ctx) {
      return;
    }
    this.clearTimers(ctx);
    ctx.state = "IDLE";
  }

  stop() {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.buttons.forEach((ctx) => this.clearTimers(ctx));
    this.buttons.clear();
  }

  // Time already held when the press reaches us. An instant from another clock
  // than Date.now() gives nothing usable, the full threshold is waited then.
  private heldSince(at: number): number {
    const heldMs = Date.now() - at;
    return heldMs >= 0 && heldMs <= this.timing.longPressThresholdMs
      ? heldMs
      : 0;
  }

  private getContext(button: number): ButtonContext {
    let ctx = this.buttons.get(button);
    if (!ctx) {
      ctx = {
        state: "IDLE",
        pressedAt: 0,
        longPressTimer: null,
        doublePressTimer: null,
      };
      this.buttons.set(button, ctx);
    }
    return ctx;
  }

  private clearTimers(ctx: ButtonContext) {
    if (ctx.longPressTimer) {
      clearTimeout(ctx.longPressTimer);
      ctx.longPressTimer = null;
    }
    if (ctx.doublePressTimer) {
      clearTimeout(ctx.doublePressTimer);
      ctx.doublePressTimer = null;
    }
  }
}
