import { z } from "zod";
import {
  CHORD_WINDOW_MS,
  DOUBLE_PRESS_WINDOW_MS,
  LONG_PRESS_THRESHOLD_MS,
} from "../constants.js";

const durationMs = (fallback: number) =>
  z.number().int().positive().default(fallback);

export const gestureTimingSchema = z
  .object({
    double_press_window_ms: durationMs(DOUBLE_PRESS_WINDOW_MS),
    long_press_threshold_ms: durationMs(LONG_PRESS_THRESHOLD_MS),
    chord_window_ms: durationMs(CHORD_WINDOW_MS),
  })
  .transform((val) => ({
    doublePressWindowMs: val.double_press_window_ms,
    longPressThresholdMs: val.long_press_threshold_ms,
    chordWindowMs: val.chord_window_ms,
  }));

export const settingsFileSchema = z.object({
  timing: gestureTimingSchema.optional(),
});
