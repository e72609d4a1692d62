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

import {ConfigError, parseConfig} from './config';

function parseError(raw: unknown): ConfigError {
  try {
    parseConfig(raw);
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error('Expected a ConfigError');
}

describe('parseConfig', () => {
  test('defaults', () => {
    const {frameTimeline, scheduler} = parseConfig();
    expect(frameTimeline.thresholds).toEqual({
      presentThreshold: 2_000_000n,
      deadlineThreshold: 2_000_000n,
      startThreshold: 2_000_000n,
    });
    expect(frameTimeline.tokenRetention).toBe(120_000_000n);
    expect(frameTimeline.maxDisplayFrames).toBe(64);
    expect(scheduler.enableFrameRateOverride).toBe(false);
    expect(scheduler.knownFrameRates.map((fps) => fps.value)).toEqual([
      24, 30, 45, 60, 72,
    ]);
  });

  test('converts milliseconds', () => {
    const {frameTimeline, scheduler} = parseConfig({
      frameTimeline: {presentThresholdMs: 1.5, maxDisplayFrames: 8},
      scheduler: {enableFrameRateOverride: true, knownFrameRates: [50]},
    });
    expect(frameTimeline.thresholds.presentThreshold).toBe(1_500_000n);
    expect(frameTimeline.thresholds.deadlineThreshold).toBe(2_000_000n);
    expect(frameTimeline.maxDisplayFrames).toBe(8);
    expect(scheduler.enableFrameRateOverride).toBe(true);
    expect(scheduler.knownFrameRates.map((fps) => fps.period)).toEqual([
      20_000_000n,
    ]);
  });

  test('rejects invalid values', () => {
    const error = parseError({frameTimeline: {maxDisplayFrames: 0}});
    expect(error.name).toBe('ConfigError');
    expect(error.issues.map((issue) => issue.path)).toEqual([
      ['frameTimeline', 'maxDisplayFrames'],
    ]);
    expect(
      error.message.startsWith(
        'Invalid config: frameTimeline.maxDisplayFrames: ',
      ),
    ).toBe(true);

    expect(
      parseError({scheduler: {knownFrameRates: [60, -1]}}).issues[0].path,
    ).toEqual(['scheduler', 'knownFrameRates', 1]);
    expect(() => parseConfig('60fps')).toThrow(ConfigError);
  });
});
