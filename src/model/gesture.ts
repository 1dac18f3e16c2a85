import { GestureException } from "../exception.js";

export type GestureType = "PRESS" | "DOUBLE_PRESS" | "LONG_PRESS" | "CHORD";

export type SingleButtonGesture = {
  type: "PRESS" | "DOUBLE_PRESS" | "LONG_PRESS";
  button: number;
};

export type ChordGesture = {
  type: "CHORD";
  buttons: readonly number[]; // Sorted ascending, at least two
};

export type Gesture = SingleButtonGesture | ChordGesture;

const KEY_NAMES: Record<GestureType, string> = {
  PRESS: "press",
  DOUBLE_PRESS: "double_press",
  LONG_PRESS: "long_press",
  CHORD: "chord",
};

export const isButtonId = (button: number) =>
  Number.isInteger(button) && button >= 0;

export const pressGesture = (button: number): Gesture => ({
  type: "PRESS",
  button,
});

export const doublePressGesture = (button: number): Gesture => ({
  type: "DOUBLE_PRESS",
  button,
});

export const longPressGesture = (button: number): Gesture => ({
  type: "LONG_PRESS",
  button,
});

/**
 * Build a chord from the buttons involved, in any order.
 * Membership is stored sorted ascending so that equal sets give equal chords.
 */
export const chordGesture = (buttons: Iterable<number>): ChordGesture => {
  const sorted = [...new Set(buttons)].sort((a, b) => a - b);
  const invalid = sorted.find((button) => !isButtonId(button));
  if (invalid !== undefined) {
    throw new GestureException(`Invalid button id in chord: ${invalid}`);
  }
  if (sorted.length < 2) {
    throw new GestureException(
      `A chord needs at least 2 distinct buttons, got [${sorted.join(",")}]`,
    );
  }
  return { type: "CHORD", buttons: sorted };
};

/**
 * Buttons involved in a gesture, ascending
 */
export const gestureButtons = (gesture: Gesture): readonly number[] =>
  gesture.type === "CHORD" ? gesture.buttons : [gesture.button];

/**
 * Stable lookup key, eg: `press:0`, `long_press:3`, `chord:1,2,5`
 */
export const gestureKey = (gesture: Gesture): string =>
  `${KEY_NAMES[gesture.type]}:${gestureButtons(gesture).join(",")}`;

export const gesturesEqual = (a: Gesture, b: Gesture): boolean =>
  gestureKey(a) === gestureKey(b);

/**
 * Check if the gesture is a chord of exactly the given buttons, in any order
 */
export const matchesChord = (
  gesture: Gesture,
  buttons: readonly number[],
): boolean => {
  if (gesture.type !== "CHORD" || gesture.buttons.length !== buttons.length) {
    return false;
  }
  const sorted = [...buttons].sort((a, b) => a - b);
  return gesture.buttons.every((button, i) => button === sorted[i]);
};
