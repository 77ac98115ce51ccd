export type {
  ApprovalReference,
  ApprovalState,
  ApprovalLookupResult,
  ApprovalLookupOptions,
  ApprovalLookup,
} from './lookup.js';
export { approvalFound, approvalFailed, UnconfiguredApprovalLookup } from './lookup.js';
