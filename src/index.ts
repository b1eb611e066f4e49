/**
 * Library exports
 */
export * from './types';
export {
  TARGET_FREQUENCIES,
  PATTERN_TEMPLATE,
  AUDIBLE_FREQUENCIES,
  DEFAULT_CONFIG,
  MAX_CODE,
} from './utils/constants';
export { createConfig, validateConfig, type ConfigOverrides } from './utils/config';
export { blinkEasing, transitionEasing, easeOut, normalBlink } from './utils/easing';
export { hexToRgb, rgbToHex, lerpColor } from './utils/color';
export { SpectralAnalyzer, hannWindow } from './audio/fft';
export {
  dominantSymbol,
  runLengthCompress,
  findLatestMatch,
  decodeWindow,
  encodeCode,
} from './audio/processing';
export { SignalDecoder, type CodeChangedListener } from './audio/decoder';
export { PcmStreamSource, BeaconToneSource, type AudioSource } from './audio/source';
export { FeedbackSynthesizer, type PcmSink } from './audio/synth';
export { BeaconPipeline, type PipelineOptions } from './audio/pipeline';
export { AnimationEngine, type AnimationEngineOptions } from './light/engine';
export { LIGHT_ACTIONS, PALETTE } from './light/patterns';
export { buildSegments, colorAt } from './light/schedule';
export { StateStore, type AppState, type DetectedCode, type StoreEvents } from './state/store';
export { createTerminalRenderer } from './render/terminal';
