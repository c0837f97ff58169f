export { AdaptiveController, type AdaptiveAction } from './admission/adaptiveController.js';
export {
  AdmissionController,
  type AdmissionDecision,
  type AdmissionRejection,
} from './admission/admissionController.js';
export { ThrottlingGuard, type ThrottleReason, type ThrottleState } from './admission/throttlingGuard.js';
export {
  loadGovernorConfig,
  parseGovernorConfig,
  type GovernorConfig,
  type GovernorConfigInput,
  type GovernorSettingsPatch,
  type MonitorConfig,
} from './config.js';
export { ConfigurationInvalidError } from './errors.js';
export { FrameGovernor, type FrameGovernorDeps } from './governor.js';
export { MetricsAggregator, type GovernorSnapshot } from './metrics/metricsAggregator.js';
export { RollingWindow } from './metrics/rollingWindow.js';
export { GovernorMonitor, type GovernorMonitorOptions, type MonitorWarning } from './monitor.js';
export {
  AnalysisPipeline,
  type AnalysisPipelineOptions,
  type AnalysisReport,
  type FrameAnalyzer,
} from './pipeline/analysisPipeline.js';
export { monotonicClock, type Clock } from './platform/clock.js';
export { processMemoryProbe, SafeMemoryReader, type MemoryProbe } from './platform/memoryProbe.js';
export { downsampleForAnalysis, fitWithin, type DownsampledFrame } from './preprocess/downsample.js';
export { FRAME_PRIORITIES, type FramePriority } from './priority.js';
export {
  isQualityLevelName,
  QUALITY_LEVEL_ORDER,
  QUALITY_LEVELS,
  type QualityLevel,
  type QualityLevelName,
  type Resolution,
} from './quality/qualityLevels.js';
export { QualityStateMachine, type QualityTransition } from './quality/qualityStateMachine.js';
export { PriorityFrameStore } from './store/priorityFrameStore.js';
