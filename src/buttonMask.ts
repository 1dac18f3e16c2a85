import { BUTTON_MASK_WIDTH } from "./constants.js";
import { RawButtonEvent } from "./model/rawButtonEvent.js";

/**
 * Indices of the buttons set in a device button mask, ascending
 */
export const pressedButtons = (mask: number): number[] => {
  const buttons: number[] = [];
  for (let i = 0; i < BUTTON_MASK_WIDTH; i++) {
    if (mask & (1 << i)) {
      buttons.push(i);
    }
  }
  return buttons;
};

/**
 * Turn the change between two consecutive masks into raw events.
 * Releases come before presses, each group ascending by button.
 */
export const diffButtonMask = (
  previous: number,
  current: number,
  timestamp: number = Date.now(),
): RawButtonEvent[] => {
  const changed = previous ^ current;
  const released = pressedButtons(changed & previous);
  const pressed = pressedButtons(changed & current);

  return [
    ...released.map((buttonId) => ({ buttonId, pressed: false, timestamp })),
    ...pressed.map((buttonId) => ({ buttonId, pressed: true, timestamp })),
  ];
};
