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

import {duration} from './time';

const NANOS_PER_SEC = 1e9;

/**
 * A frame rate in frames per second, together with the vsync period it
 * implies. Comparisons go through the *WithMargin() helpers because rates
 * derived from periods are never exact (1e9 / 16_666_666 != 60).
 */
export class Fps {
  static readonly MARGIN = 0.001;

  static readonly INVALID = new Fps(0, 0n);

  private constructor(
    readonly value: number,
    // Period in nanoseconds, truncated. Zero for an invalid rate.
    readonly period: duration,
  ) {}

  static fromValue(fps: number): Fps {
    if (!(fps > 0)) return Fps.INVALID;
    return new Fps(fps, BigInt(Math.trunc(NANOS_PER_SEC / fps)));
  }

  static fromPeriod(period: duration): Fps {
    if (period <= 0n) return Fps.INVALID;
    return new Fps(NANOS_PER_SEC / Number(period), period);
  }

  isValid(): boolean {
    return this.value > 0;
  }

  intValue(): number {
    return Math.round(this.value);
  }

  equalsWithMargin(other: Fps): boolean {
    return Math.abs(this.value - other.value) < Fps.MARGIN;
  }

  lessThanWithMargin(other: Fps): boolean {
    return this.value < other.value - Fps.MARGIN;
  }

  greaterThanWithMargin(other: Fps): boolean {
    return this.value > other.value + Fps.MARGIN;
  }

  lessThanOrEqualWithMargin(other: Fps): boolean {
    return !this.greaterThanWithMargin(other);
  }

  greaterThanOrEqualWithMargin(other: Fps): boolean {
    return !this.lessThanWithMargin(other);
  }

  toString(): string {
    return `${this.value.toFixed(2)}fps`;
  }

  static compare(a: Fps, b: Fps): number {
    return a.value - b.value;
  }
}
