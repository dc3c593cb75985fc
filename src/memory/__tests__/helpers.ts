import { defaultMemoryConfig, type MemoryConfig } from "@/config";
import { IN_MEMORY, openDatabase, type StoreContext } from "@/memory/db";
import { MemoryStore } from "@/memory/store";
import type { Clock } from "@/utils/clock";

export const START = "2025-03-01T09:00:00.000Z";

export type ManualClock = {
  clock: Clock;
  advanceMinutes(minutes: number): void;
};

export function manualClock(start = START): ManualClock {
  let now = new Date(start).getTime();
  return {
    clock: () => new Date(now),
    advanceMinutes(minutes) {
      now += minutes * 60_000;
    },
  };
}

export function testConfig(overrides: Partial<MemoryConfig> = {}): MemoryConfig {
  return { ...defaultMemoryConfig("/nonexistent/recollect-test"), ...overrides };
}

export function openTestContext(overrides: Partial<MemoryConfig> = {}): StoreContext & ManualClock {
  const time = manualClock();
  const config = testConfig(overrides);
  return { db: openDatabase(IN_MEMORY, config.busyTimeoutMs), config, ...time };
}

export function openTestStore(overrides: Partial<MemoryConfig> = {}): { store: MemoryStore } & ManualClock {
  const time = manualClock();
  const config = testConfig(overrides);
  return { store: new MemoryStore(openDatabase(IN_MEMORY, config.busyTimeoutMs), config, time.clock), ...time };
}
