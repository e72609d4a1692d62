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

import {Duration, duration, Time, time} from '../base/time';
import {TimelineItem, Token} from './types';

export type Clock = () => time;

export const systemClock: Clock = () => Time.fromRaw(process.hrtime.bigint());

export const DEFAULT_TOKEN_RETENTION: duration = Duration.fromMillis(120);

interface PredictionsInfo {
  issueTime: time;
  predictions: TimelineItem;
}

/**
 * Hands out tokens that stand for a set of predictions (expected start, end
 * and present time). Whoever does the work later quotes the token, and the
 * predictions are looked up to compare against what actually happened.
 *
 * Predictions are only kept for |retention|. A token that is looked up after
 * that is reported as missing.
 */
export class TokenManager {
  // Map iterates in insertion order, which is issue order.
  private readonly predictions = new Map<Token, PredictionsInfo>();
  private currentToken: Token = 1;

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly retention: duration = DEFAULT_TOKEN_RETENTION,
  ) {}

  generateTokenForPredictions(predictions: TimelineItem): Token {
    const now = this.clock();
    const token = this.currentToken++;
    this.predictions.set(token, {
      issueTime: now,
      predictions: {...predictions},
    });
    this.flushTokens(now);
    return token;
  }

  getPredictionsForToken(token: Token): TimelineItem | undefined {
    const info = this.predictions.get(token);
    if (info === undefined) return undefined;
    // Eviction only runs when tokens are issued, so an entry past its window
    // may still be in the map.
    if (Time.diff(this.clock(), info.issueTime) >= this.retention) {
      return undefined;
    }
    return {...info.predictions};
  }

  get size(): number {
    return this.predictions.size;
  }

  private flushTokens(flushTime: time) {
    for (const [token, info] of this.predictions) {
      if (Time.diff(flushTime, info.issueTime) < this.retention) {
        // Tokens are issued in time order: everything after this one is
        // within the retention window too.
        break;
      }
      this.predictions.delete(token);
    }
  }
}
