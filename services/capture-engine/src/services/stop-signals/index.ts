/**
 * Operator Stop Channel Exports
 */

export { watchStopFlag, watchKeyPress, watchProcessSignals } from './stop-signals.js';

export type {
  Disposer,
  FlagFileOptions,
  KeyInput,
  KeyPressOptions,
  SignalSource,
} from './stop-signals.js';
