/**
 * Max gap between a release and the following press of the same button
 * that still counts as one double press.
 */
export const DOUBLE_PRESS_WINDOW_MS = 300;

/**
 * Continuous hold after which a long press fires, while the button is still down.
 */
export const LONG_PRESS_THRESHOLD_MS = 500;

/**
 * Max gap between the first press and a joining press for the two to form a chord.
 */
export const CHORD_WINDOW_MS = 50;

/**
 * Width of the pressed-button mask reported by the device
 */
export const BUTTON_MASK_WIDTH = 16;
