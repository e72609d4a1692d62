// Copyright (C) 2025 The Android Open Source Project
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//      http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

export {Fps} from './base/fps';
export {
  addErrorHandler,
  ErrorDetails,
  ErrorHandler,
  FatalError,
  removeErrorHandler,
} from './base/logging';
export {Duration, duration, Time, time} from './base/time';
export {
  CONFIG_SCHEMA,
  Config,
  ConfigError,
  ConfigJson,
  FrameTimelineConfig,
  parseConfig,
  SchedulerConfig,
} from './config';
export {DisplayFrame} from './frame_timeline/display_frame';
export {
  FrameTimeline,
  FrameTimelineArgs,
} from './frame_timeline/frame_timeline';
export {
  decodeJankMask,
  isJanky,
  JankMask,
  jankMaskToString,
  JankType,
} from './frame_timeline/jank_type';
export {SurfaceFrame} from './frame_timeline/surface_frame';
export {Clock, TokenManager} from './frame_timeline/token_manager';
export {
  DEFAULT_JANK_THRESHOLDS,
  FenceSignal,
  FramePresentMetadata,
  FrameReadyMetadata,
  FrameStartMetadata,
  FrameTimelineEvent,
  FrameTimelineInfo,
  FrameTimelineSink,
  INVALID_TOKEN,
  JankClassificationThresholds,
  JankyFramesInfo,
  PredictionState,
  PresentFence,
  PresentState,
  PresentType,
  SurfaceFrameHandle,
  TimelineItem,
  TimeStats,
  Token,
} from './frame_timeline/types';
export {
  DefaultLayerVoteType,
  KnownFrameRates,
  LayerInfo,
  LayerInfoVote,
  LayerUpdateType,
} from './scheduler/layer_info';
export {
  BestRefreshRate,
  RefreshRateConfigs,
} from './scheduler/refresh_rate_configs';
export {
  DisplayMode,
  DisplayModeId,
  FpsRange,
  GlobalSignals,
  KernelIdleTimerAction,
  LayerRequirement,
  LayerVote,
  LayerVoteType,
  makePolicy,
  Policy,
  PolicyStatus,
  RefreshRate,
  Seamlessness,
} from './scheduler/types';
