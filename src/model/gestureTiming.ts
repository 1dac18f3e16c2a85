export interface GestureTiming {
  doublePressWindowMs: number;
  longPressThresholdMs: number;
  chordWindowMs: number;
}
