/**
 * @backstop/guarantee -- the per-venue guarantee engine.
 *
 * @packageDocumentation
 */

export { VenueGuaranteeEngine } from './engine';
export type { LiabilityPool, VenueGuaranteeEngineOptions } from './engine';

export { RoleBook } from './access';
export type { RoleConfig } from './access';

export { EngineStatus } from './types';
export type { EngineUnderwriter, FeePayment, MonthlyReport, PerformanceSummary } from './types';
