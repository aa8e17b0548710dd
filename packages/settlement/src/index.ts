/**
 * @souk/settlement — Settlement-asset ledger adapter.
 *
 * The exchange's only path for moving value:
 * - SettlementLedger is the contract the exchange consumes
 * - InMemorySettlementLedger is a complete in-process implementation
 * - parseUnits / formatUnits convert decimal strings to base units
 */

export { InMemorySettlementLedger } from "./in-memory-ledger.js";

export { parseUnits, formatUnits, assertPositiveAmount } from "./units.js";

export type {
  SettlementLedger,
  SettlementErrorCode,
  TransferDirection,
  TransferRecord,
  TransferListener,
  TransferSubscription,
} from "./types.js";

export { SettlementError } from "./types.js";
