import { readFile } from "fs/promises";
import { Logger } from "homebridge";
import { parse } from "yaml";
import { ZodError } from "zod";

import {
  CHORD_WINDOW_MS,
  DOUBLE_PRESS_WINDOW_MS,
  LONG_PRESS_THRESHOLD_MS,
} from "./constants.js";
import { gestureTimingSchema, settingsFileSchema } from "./dto/gestureTiming.js";
import { GestureException } from "./exception.js";
import { GestureTiming } from "./model/gestureTiming.js";

export const DEFAULT_GESTURE_TIMING: Readonly<GestureTiming> = {
  doublePressWindowMs: DOUBLE_PRESS_WINDOW_MS,
  longPressThresholdMs: LONG_PRESS_THRESHOLD_MS,
  chordWindowMs: CHORD_WINDOW_MS,
};

const describeIssues = (error: ZodError) =>
  error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");

const isMissingFile = (err: unknown) =>
  err instanceof Error && "code" in err && err.code === "ENOENT";

/**
 * Validate user supplied timing settings, eg: `{ "chord_window_ms": 40 }`.
 * Missing durations fall back to their defaults.
 */
export const parseGestureTiming = (input: unknown = {}): GestureTiming => {
  const result = gestureTimingSchema.safeParse(input);
  if (!result.success) {
    throw new GestureException(
      `Invalid gesture timing: ${describeIssues(result.error)}`,
    );
  }
  return result.data;
};

/**
 * Read the `timing` section of a YAML (or JSON) settings file, eg:
 *
 * ```yaml
 * timing:
 *   double_press_window_ms: 300
 *   long_press_threshold_ms: 500
 *   chord_window_ms: 50
 * ```
 *
 * A file that does not exist, or is empty, gives the defaults.
 */
export const loadGestureTiming = async (
  path: string,
  log: Logger,
): Promise<GestureTiming> => {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) {
      log.warn(`Settings file not found: ${path}, using default timing`);
      return { ...DEFAULT_GESTURE_TIMING };
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = parse(content) ?? {};
  } catch (err) {
    throw new GestureException(
      `Unable to parse settings file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const result = settingsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new GestureException(
      `Invalid settings file ${path}: ${describeIssues(result.error)}`,
    );
  }

  const timing = result.data.timing ?? { ...DEFAULT_GESTURE_TIMING };
  log.debug("Gesture timing:", timing);
  return timing;
};
