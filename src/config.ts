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

import {z} from 'zod';
import {Fps} from './base/fps';
import {Duration, duration} from './base/time';
import {JankClassificationThresholds} from './frame_timeline/types';

export const FRAME_TIMELINE_CONFIG_SCHEMA = z.object({
  presentThresholdMs: z.number().nonnegative().default(2),
  deadlineThresholdMs: z.number().nonnegative().default(2),
  startThresholdMs: z.number().nonnegative().default(2),
  tokenRetentionMs: z.number().positive().default(120),
  maxDisplayFrames: z.number().int().positive().default(64),
});

export const SCHEDULER_CONFIG_SCHEMA = z.object({
  // Lets a layer voting ExplicitExact be satisfied by a multiple of its rate,
  // with the app throttled by a frame-rate override.
  enableFrameRateOverride: z.boolean().default(false),
  // Rates content is commonly authored at. The display's own rates are added
  // to these.
  knownFrameRates: z.array(z.number().positive()).default([24, 30, 45, 60, 72]),
});

export const CONFIG_SCHEMA = z.object({
  frameTimeline: FRAME_TIMELINE_CONFIG_SCHEMA.default({}),
  scheduler: SCHEDULER_CONFIG_SCHEMA.default({}),
});

export type ConfigJson = z.input<typeof CONFIG_SCHEMA>;

export interface FrameTimelineConfig {
  thresholds: JankClassificationThresholds;
  tokenRetention: duration;
  maxDisplayFrames: number;
}

export interface SchedulerConfig {
  enableFrameRateOverride: boolean;
  knownFrameRates: Fps[];
}

export interface Config {
  frameTimeline: FrameTimelineConfig;
  scheduler: SchedulerConfig;
}

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      'Invalid config: ' +
        issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; '),
    );
    this.name = 'ConfigError';
  }
}

// Validates |raw| (typically parsed JSON, all durations in milliseconds) and
// fills in defaults. Throws ConfigError if it doesn't match the schema.
export function parseConfig(raw: unknown = {}): Config {
  const result = CONFIG_SCHEMA.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  const {frameTimeline, scheduler} = result.data;
  return {
    frameTimeline: {
      thresholds: {
        presentThreshold: Duration.fromMillis(frameTimeline.presentThresholdMs),
        deadlineThreshold: Duration.fromMillis(
          frameTimeline.deadlineThresholdMs,
        ),
        startThreshold: Duration.fromMillis(frameTimeline.startThresholdMs),
      },
      tokenRetention: Duration.fromMillis(frameTimeline.tokenRetentionMs),
      maxDisplayFrames: frameTimeline.maxDisplayFrames,
    },
    scheduler: {
      enableFrameRateOverride: scheduler.enableFrameRateOverride,
      knownFrameRates: scheduler.knownFrameRates.map((fps) =>
        Fps.fromValue(fps),
      ),
    },
  };
}
