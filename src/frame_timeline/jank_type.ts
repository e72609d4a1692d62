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

import {fail} from '../base/logging';

// Causes of a missed deadline. A frame may carry several of these at once,
// so values are combined into a bitmask (see JankMask).
export enum JankType {
  None = 0x0,
  // The display driver presented later than the compositor asked for.
  DisplayDriverLate = 0x1,
  CompositorCpuDeadlineMissed = 0x2,
  CompositorGpuDeadlineMissed = 0x4,
  // The frame producer (the app) finished its work late.
  ProducerDeadlineMissed = 0x8,
  // Present was off by an amount that is not a multiple of the vsync period.
  PredictionError = 0x10,
  // Present was off by a whole number of vsyncs.
  CompositorScheduling = 0x20,
  // The producer queued ahead of the latch, so the frame sat in the queue.
  BufferStuffing = 0x40,
  Unknown = 0x80,
}

export type JankMask = number;

// Decoding order, which is also the order names appear in.
const JANK_NAMES: ReadonlyArray<[JankType, string]> = [
  [JankType.DisplayDriverLate, 'Display Driver Late'],
  [JankType.CompositorCpuDeadlineMissed, 'Compositor CPU Deadline Missed'],
  [JankType.CompositorGpuDeadlineMissed, 'Compositor GPU Deadline Missed'],
  [JankType.ProducerDeadlineMissed, 'Producer Deadline Missed'],
  [JankType.PredictionError, 'Prediction Error'],
  [JankType.CompositorScheduling, 'Compositor Scheduling'],
  [JankType.BufferStuffing, 'Buffer Stuffing'],
  [JankType.Unknown, 'Unknown Jank'],
];

export function isJanky(mask: JankMask): boolean {
  return mask !== JankType.None;
}

// Splits a mask into its causes. A bit that is not a known cause means the
// mask was corrupted somewhere, which is fatal.
export function decodeJankMask(mask: JankMask): JankType[] {
  const causes: JankType[] = [];
  let remaining = mask;
  for (const [type] of JANK_NAMES) {
    if (remaining & type) {
      causes.push(type);
      remaining &= ~type;
    }
  }
  if (remaining !== 0) {
    fail(`Unrecognized jank type value 0x${remaining.toString(16)}`);
  }
  return causes;
}

export function jankMaskToString(mask: JankMask): string {
  if (mask === JankType.None) {
    return 'None';
  }
  const names = new Map(JANK_NAMES);
  return decodeJankMask(mask)
    .map((type) => names.get(type))
    .join(', ');
}
