/**
 * @backstop/core -- execution primitives shared by every stateful component:
 * atomic units of work, re-entrancy guards, clocks, the event bus and the
 * settlement journal.
 *
 * @packageDocumentation
 */

export { Transactor, snapshotParticipant } from './transactor';
export type { Participant, Restore, TransactorOptions } from './transactor';

export { ReentrancyGuard } from './reentrancy';

export { ManualClock, systemClock } from './clock';
export type { Clock } from './clock';

export { BackstopEventEmitter, BACKSTOP_EVENTS } from './events';
export type { BackstopEventMap, BackstopEventName, UnderwriterAmount } from './events';

export { SettlementJournal } from './journal';
export type { JournalEntry } from './journal';

