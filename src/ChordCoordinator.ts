import { Logger } from "homebridge";

import { ButtonPressDetector } from "./ButtonPressDetector.js";
import {
  Gesture,
  chordGesture,
  gestureKey,
  isButtonId,
} from "./model/gesture.js";
import { GestureTiming } from "./model/gestureTiming.js";
import { RawButtonEvent } from "./model/rawButtonEvent.js";

type CoordinatorState = "IDLE" | "COLLECTING_OVERLAP";

/**
 * Entry point for raw button events.
 *
 * Every press is held back for the chord window. If another button goes down
 * inside that window the buttons are arbitrated as a chord, otherwise the
 * press is handed to the per button detector. A held button still joins a
 * chord later on, its detector cycle is then dropped.
 */
export class ChordCoordinator {
  private state: CoordinatorState = "IDLE";
  // Buttons held and not yet consumed by a chord -> press instant
  private pressedButtons = new Map<number, number>();
  // Held buttons whose current press was handed to the detector
  private forwardedButtons = new Set<number>();
  private deferredPressTimers = new Map<
    number,
    ReturnType<typeof setTimeout>
  >();
  private chordTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly detector: ButtonPressDetector;
  private timing: GestureTiming;
  private stopped = false;

  constructor(
    timing: GestureTiming,
    public readonly log: Logger,
    private readonly onGesture: (gesture: Gesture) => void,
  ) {
    this.timing = { ...timing };
    this.detector = new ButtonPressDetector(this.timing, this.emit);
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Swap the timing, gestures already in progress keep the timers they armed
   */
  updateTiming(timing: GestureTiming) {
    this.timing = { ...timing };
    this.detector.updateTiming(this.timing);
    this.log.debug("Gesture timing updated:", this.timing);
  }

  processEvent(event: RawButtonEvent) {
    if (this.stopped) {
      this.log.debug(
        `Ignoring button ${event.buttonId} event, gesture engine is stopped`,
      );
      return;
    }

    if (!isButtonId(event.buttonId)) {
      this.log.debug(`Ignoring event for invalid button id ${event.buttonId}`);
      return;
    }

    if (event.pressed) {
      this.handlePress(event.buttonId, event.timestamp);
    } else {
      this.handleRelease(event.buttonId, event.timestamp);
    }
  }

  stop() {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.clearChordTimer();
    this.deferredPressTimers.forEach((timer) => clearTimeout(timer));
    this.deferredPressTimers.clear();
    this.pressedButtons.clear();
    this.forwardedButtons.clear();
    this.state = "IDLE";
    this.detector.stop();
    this.log.debug("Gesture engine stopped");
  }

  //   -------------- Private -------------- \\

  private handlePress(button: number, at: number) {
    if (this.pressedButtons.has(button)) {
      return;
    }
    this.pressedButtons.set(button, at);

    // Second tap of a double press goes straight to the detector
    if (this.detector.isWaitingForDouble(button)) {
      this.forwardedButtons.add(button);
      this.detector.handlePress(button, at);
    }

    if (this.pressedButtons.size > 1) {
      this.state = "COLLECTING_OVERLAP";
      // Each joining press restarts the window
      this.clearChordTimer();
      this.chordTimer = setTimeout(() => {
        this.chordTimer = null;
        if (!this.stopped) {
          this.resolveChord();
        }
      }, this.timing.chordWindowMs);
      return;
    }

    if (this.forwardedButtons.has(button)) {
      return;
    }

    this.deferredPressTimers.set(
      button,
      setTimeout(() => {
        this.deferredPressTimers.delete(button);
        if (
          this.stopped ||
          this.state !== "IDLE" ||
          this.pressedButtons.size !== 1 ||
          !this.pressedButtons.has(button)
        ) {
          return;
        }
        this.forwardedButtons.add(button);
        this.detector.handlePress(button, at);
      }, this.timing.chordWindowMs),
    );
  }

  private handleRelease(button: number, at: number) {
    const pressedAt = this.pressedButtons.get(button);
    if (pressedAt === undefined) {
      // Consumed by a chord, or never seen pressed
      return;
    }

    if (this.state === "COLLECTING_OVERLAP") {
      this.resolveChord();
    }

    if (this.pressedButtons.has(button)) {
      this.releaseFromArbitration(button);
      if (this.forwardedButtons.delete(button)) {
        this.detector.handleRelease(button, at);
      } else {
        // Released before its chord window ran out
        this.detector.handlePress(button, pressedAt);
        this.detector.handleRelease(button, at);
      }
    }

    if (this.pressedButtons.size === 0) {
      this.state = "IDLE";
    }
  }

  private releaseFromArbitration(button: number) {
    const timer = this.deferredPressTimers.get(button);
    if (timer) {
      clearTimeout(timer);
      this.deferredPressTimers.delete(button);
    }
    this.pressedButtons.delete(button);
  }

  private resolveChord() {
    if (this.state !== "COLLECTING_OVERLAP") {
      return;
    }
    this.clearChordTimer();
    this.state = "IDLE";

    if (this.pressedButtons.size < 2) {
      this.log.debug("Chord window closed with a single button, no chord");
      return;
    }

    const chord = chordGesture(this.pressedButtons.keys());
    // Buttons already handed to the detector give up their own gesture
    this.forwardedButtons.forEach((button) => {
      if (this.pressedButtons.has(button)) {
        this.detector.cancel(button);
        this.forwardedButtons.delete(button);
      }
    });
    this.pressedButtons.clear();
    this.deferredPressTimers.forEach((timer) => clearTimeout(timer));
    this.deferredPressTimers.clear();
    this.emit(chord);
  }

  private clearChordTimer() {
    if (this.chordTimer) {
      clearTimeout(this.chordTimer);
      this.chordTimer = null;
    }
  }

  private emit = (gesture: Gesture) => {
    this.log.debug(`Gesture detected: ${gestureKey(gesture)}`);
    try {
      this.onGesture(gesture);
    } catch (err) {
      this.log.error(`Gesture handler failed for ${gestureKey(gesture)}:`, err);
    }
  };
}
