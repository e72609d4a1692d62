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

export interface ErrorStackEntry {
  name: string; // e.g. setPresentState
  location: string; // e.g. surface_frame.ts:12:3
}

export interface ErrorDetails {
  message: string; // setPresentState called twice on layer-1
  stack: ErrorStackEntry[];
}

export type ErrorHandler = (err: ErrorDetails) => void;
const errorHandlers: ErrorHandler[] = [];

// Thrown for programming errors: broken invariants that signal a bug in the
// caller (e.g. completing the same frame twice). These are never caught
// inside the library.
export class FatalError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export function addErrorHandler(handler: ErrorHandler) {
  if (!errorHandlers.includes(handler)) {
    errorHandlers.push(handler);
  }
}

export function removeErrorHandler(handler: ErrorHandler) {
  const pos = errorHandlers.indexOf(handler);
  if (pos >= 0) {
    errorHandlers.splice(pos, 1);
  }
}

// Turns an error into ErrorDetails and invokes all the handlers registered
// through addErrorHandler.
export function reportError(err: unknown) {
  let errMsg = err instanceof Error ? err.message : `${err}`;
  errMsg = errMsg.replace(/^Error:/, '').trim();

  const stack: ErrorStackEntry[] = [];
  const rawStack = err instanceof Error ? err.stack ?? '' : '';
  for (let line of rawStack.replaceAll(/\r/g, '').split('\n')) {
    if (!/^\s*at\s/.test(line)) continue;
    // '    at FooBar (/path/file.ts:20:7)' -> 'FooBar@/path/file.ts:20:7'
    line = line.replace(/^\s*at\s*/, '');
    line = line.replace(/\s*\(([^)]+)\)$/, '@$1');
    const lastAt = line.lastIndexOf('@');
    if (lastAt >= 0) {
      stack.push({
        name: line.substring(0, lastAt),
        location: line.substring(lastAt + 1),
      });
    } else {
      stack.push({name: '', location: line});
    }
  }

  for (const handler of errorHandlers) {
    handler({message: errMsg, stack});
  }
}

// Reports and throws a FatalError. Use for states that can only be reached
// through a bug upstream.
export function fail(message: string): never {
  const err = new FatalError(message);
  reportError(err);
  throw err;
}

export function assertExists<A>(
  value: A | null | undefined,
  description = '<expression>',
): A {
  if (value === null || value === undefined) {
    fail(`\`${description}\` doesn't exist`);
  }
  return value;
}

export function assertTrue(value: boolean, optMsg?: string) {
  if (!value) {
    fail(optMsg ?? 'Failed assertion');
  }
}

export function assertFalse(value: boolean, optMsg?: string) {
  assertTrue(!value, optMsg);
}
