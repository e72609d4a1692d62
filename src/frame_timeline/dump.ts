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
import {PredictionState, TimelineItem} from './types';

const LABEL_WIDTH = 10;
const CELL_WIDTH = 12;
const NOT_AVAILABLE = 'N/A';

function row(indent: string, label: string, cells: string[]): string {
  const columns = cells.map((cell) => ` | ${cell.padStart(CELL_WIDTH)}`);
  return `${indent}${label.padEnd(LABEL_WIDTH)}${columns.join('')}\n`;
}

function relativeMillis(t: time, baseTime: time): string {
  return Duration.formatMillis(Duration.max(0n, Time.diff(t, baseTime)), 2);
}

/**
 * Renders expected vs actual timings as a small table, in milliseconds
 * relative to |baseTime|:
 *
 *              |   Start time |     End time | Present time
 *   Expected   |         0.00 |        10.00 |        16.00
 *   Actual     |         0.00 |        11.00 |          N/A
 *   -----------------------------------------------------
 *
 * The expected row only appears when the predictions are valid. Actual
 * timestamps that were never set print as N/A.
 */
export function dumpTable(
  predictions: TimelineItem,
  actuals: TimelineItem,
  indent: string,
  predictionState: PredictionState,
  baseTime: time,
): string {
  let result = row(indent, '', ['Start time', 'End time', 'Present time']);
  if (predictionState === PredictionState.Valid) {
    result += row(indent, 'Expected', [
      relativeMillis(predictions.startTime, baseTime),
      relativeMillis(predictions.endTime, baseTime),
      relativeMillis(predictions.presentTime, baseTime),
    ]);
  }
  // Some producers (e.g. animation leashes) report a negative end time.
  result += row(indent, 'Actual', [
    Time.isSet(actuals.startTime)
      ? relativeMillis(actuals.startTime, baseTime)
      : NOT_AVAILABLE,
    actuals.endTime > 0n
      ? relativeMillis(actuals.endTime, baseTime)
      : NOT_AVAILABLE,
    Time.isSet(actuals.presentTime)
      ? relativeMillis(actuals.presentTime, baseTime)
      : NOT_AVAILABLE,
  ]);
  result += `${indent}${'-'.repeat(LABEL_WIDTH + 3 * (CELL_WIDTH + 3))}\n`;
  return result;
}

// Smallest timestamp among the valid predictions and the actuals that are set.
export function getMinTime(
  predictionState: PredictionState,
  predictions: TimelineItem,
  actuals: TimelineItem,
): time | undefined {
  const candidates = [actuals.startTime, actuals.endTime, actuals.presentTime]
    .filter((t) => Time.isSet(t));
  if (predictionState === PredictionState.Valid) {
    // Start is never after end or present.
    candidates.push(predictions.startTime);
  }
  if (candidates.length === 0) return undefined;
  return candidates.reduce((a, b) => Time.min(a, b));
}
