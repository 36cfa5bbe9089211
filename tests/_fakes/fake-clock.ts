// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/fake-clock`
 * Purpose: Deterministic Clock for elapsed-time displays in tests.
 * Scope: Provides explicit time control. Does NOT replace system Date globally.
 * Invariants: Time advances only via explicit calls.
 * Side-effects: none
 * Links: src/ports/clock.port.ts
 * @public
 */

import type { Clock } from "@/ports";

export const DEFAULT_FAKE_TIME = "2024-01-01T00:00:00.000Z";

export class FakeClock implements Clock {
  private currentTime: Date;

  constructor(initialTime: string | Date = DEFAULT_FAKE_TIME) {
    this.currentTime = new Date(initialTime);
  }

  now(): string {
    return this.currentTime.toISOString();
  }

  nowMs(): number {
    return this.currentTime.getTime();
  }

  advance(milliseconds: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + milliseconds);
  }

  setTime(time: string | Date): void {
    this.currentTime = new Date(time);
  }
}
