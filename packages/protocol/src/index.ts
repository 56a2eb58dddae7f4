/**
 * @backstop/protocol -- wires the collateral asset, venue registry,
 * underwriter pool and guarantee engines into one protocol instance.
 *
 * @packageDocumentation
 */

export { BackstopProtocol, createProtocol, loadProtocol, venueAccounts } from './protocol';
export type { LoadProtocolOptions, ProtocolOptions, VenueAccounts, VenueRegistration } from './types';
