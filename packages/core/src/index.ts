/**
 * @dualcut/core
 *
 * Core domain package containing:
 * - Batch state machine
 * - Quality, side and capability tables
 * - Error handling
 * - Shared types
 * - Binary configuration
 */

// State machine
export {
  BatchStateMachine,
  isValidTransition,
  getNextStates,
  isTerminalState,
  describeState,
} from './stateMachine.js';

export type {
  BatchState,
  BatchStateKind,
  BatchStateTransition,
} from './stateMachine.js';

// Types
export type {
  QualityPreset,
  EncodingCapability,
  CapabilityInfo,
} from './types/encoding.js';

export type {
  SplitSide,
  CropRegion,
  VideoDescriptor,
  EncodingProgress,
  SplitResult,
  BatchFailure,
  BatchProgressEvent,
  BatchOutcome,
} from './types/split.js';

// Split geometry and presets
export {
  QUALITY_PRESETS,
  DEFAULT_QUALITY,
  EXPECTED_WIDTH,
  EXPECTED_HEIGHT,
  parseQualityPreset,
  parseSplitSide,
  cropFilter,
  hasExpectedDimensions,
  aspectRatio,
} from './split.js';

// Capabilities
export {
  CAPABILITY_PREFERENCE,
  CAPABILITIES,
  isSupportedOnPlatform,
} from './encoders.js';

// Errors
export {
  DualcutError,
  ValidationError,
  EngineNotFoundError,
  ProbeError,
  InvalidQualityError,
  InvalidSideError,
  SplitFailedError,
  OutputDirectoryError,
  StateTransitionError,
} from './errors/index.js';

// Binary Configuration
export {
  binaries,
  getBinaryPath,
  getBinaryVersion,
  isBinaryAvailable,
  checkBinary,
  getBinaryFolders,
  type BinaryConfig,
  type BinariesConfig,
  type BinaryName,
  type BinarySource,
} from './config/binaries.js';
