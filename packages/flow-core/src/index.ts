export { AccountingEngine } from "./engine/AccountingEngine.js";
export type { AccountingEngineOptions, BufferCounts, FlowStatistics, LogMode } from "./engine/AccountingEngine.js";

export { PERIODS, BOUNDARY_ORDER, PERIOD_RULES, assertValidZone, mapPeriods, toIsoString } from "./period/calendar.js";
export type { PeriodName, PeriodRule } from "./period/calendar.js";
export { PeriodAccount, ML_PER_L } from "./period/PeriodAccount.js";
export type { PeriodState, FinalizedPeriod, CaughtUpPeriod } from "./period/PeriodAccount.js";

export { SlidingWindowBuffer, pickValue, pickMax, pickMin } from "./window/SlidingWindowBuffer.js";
export type { TimedEntry, ValueEntry, FlowStatsEntry, SlidingWindowOptions, Selector } from "./window/SlidingWindowBuffer.js";

export { LeakDetector } from "./leak/LeakDetector.js";
export type { LeakEvent, LeakEventKind } from "./leak/LeakDetector.js";

export { estimateCost, costForVolume, isUnitSystem, UNIT_SYSTEMS } from "./analysis/estimateCost.js";
export type { UnitSystem, CostEstimationInput, CostEstimationResult } from "./analysis/estimateCost.js";

export { encodeSnapshot, decodeSnapshot, emptySnapshot } from "./persistence/snapshot.js";
export type { EngineSnapshot, PeriodSnapshot, StoredSnapshot, StoredPeriod } from "./persistence/snapshot.js";

export { PushMeter } from "./meter/PushMeter.js";
export type { PushInput, ReadingListener } from "./meter/PushMeter.js";
export { VolumeAccumulators } from "./meter/VolumeAccumulators.js";
export type { AccumulatorState } from "./meter/VolumeAccumulators.js";
export type { MeterTransport, MeterReading, PushResult } from "./meter/MeterTransport.js";

export * from "./timers/scheduler.js";
export * from "./timers/timing.js";
