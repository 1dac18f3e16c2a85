export { ChordCoordinator } from "./ChordCoordinator.js";
export { ButtonPressDetector, DetectorTiming } from "./ButtonPressDetector.js";
export {
  Gesture,
  GestureType,
  ChordGesture,
  SingleButtonGesture,
  pressGesture,
  doublePressGesture,
  longPressGesture,
  chordGesture,
  gestureButtons,
  gestureKey,
  gesturesEqual,
  matchesChord,
} from "./model/gesture.js";
export { GestureTiming } from "./model/gestureTiming.js";
export { RawButtonEvent, createButtonEvent } from "./model/rawButtonEvent.js";
export { pressedButtons, diffButtonMask } from "./buttonMask.js";
export {
  DEFAULT_GESTURE_TIMING,
  parseGestureTiming,
  loadGestureTiming,
} from "./settings.js";
export { gestureTimingSchema } from "./dto/gestureTiming.js";
export { GestureException } from "./exception.js";
