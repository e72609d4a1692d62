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

import {Duration, Time, time} from '../base/time';
import {TokenManager} from './token_manager';
import {TimelineItem} from './types';

function timelineItem(start: number, end: number, present: number) {
  return {
    startTime: Time.fromMillis(start),
    endTime: Time.fromMillis(end),
    presentTime: Time.fromMillis(present),
  };
}

describe('TokenManager', () => {
  let now: time;
  let tokenManager: TokenManager;

  beforeEach(() => {
    now = Time.fromMillis(1000);
    tokenManager = new TokenManager(() => now, Duration.fromMillis(120));
  });

  test('tokens increase monotonically', () => {
    const first = tokenManager.generateTokenForPredictions(
      timelineItem(0, 0, 0),
    );
    const second = tokenManager.generateTokenForPredictions(
      timelineItem(0, 0, 0),
    );
    expect(first).toBe(1);
    expect(second).toBe(2);
  });

  test('returns the predictions for a token', () => {
    const predictions = timelineItem(10, 20, 30);
    const token = tokenManager.generateTokenForPredictions(predictions);
    expect(tokenManager.getPredictionsForToken(token)).toEqual(predictions);
  });

  test('returns a copy of the predictions', () => {
    const predictions: TimelineItem = timelineItem(10, 20, 30);
    const token = tokenManager.generateTokenForPredictions(predictions);
    predictions.endTime = Time.fromMillis(25);
    expect(tokenManager.getPredictionsForToken(token)?.endTime).toBe(
      Time.fromMillis(20),
    );
  });

  test('unknown tokens have no predictions', () => {
    expect(tokenManager.getPredictionsForToken(42)).toBeUndefined();
  });

  test('predictions expire after the retention window', () => {
    const token = tokenManager.generateTokenForPredictions(
      timelineItem(10, 20, 30),
    );
    now = Time.fromMillis(1119);
    expect(tokenManager.getPredictionsForToken(token)).toBeDefined();
    now = Time.fromMillis(1120);
    expect(tokenManager.getPredictionsForToken(token)).toBeUndefined();
  });

  test('issuing a token evicts the expired ones only', () => {
    const oldToken = tokenManager.generateTokenForPredictions(
      timelineItem(0, 0, 0),
    );
    now = Time.fromMillis(1100);
    const youngToken = tokenManager.generateTokenForPredictions(
      timelineItem(0, 0, 0),
    );
    expect(tokenManager.size).toBe(2);

    now = Time.fromMillis(1150);
    const newToken = tokenManager.generateTokenForPredictions(
      timelineItem(0, 0, 0),
    );
    expect(tokenManager.size).toBe(2);
    expect(tokenManager.getPredictionsForToken(oldToken)).toBeUndefined();
    expect(tokenManager.getPredictionsForToken(youngToken)).toBeDefined();
    expect(tokenManager.getPredictionsForToken(newToken)).toBeDefined();
  });
});
