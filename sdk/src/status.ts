/**
 * Response codes returned by nodes, both as precheck results and as receipt
 * statuses. Values are the network's wire numbers.
 */
export enum Status {
  OK = 0,
  INVALID_TRANSACTION = 1,
  PAYER_ACCOUNT_NOT_FOUND = 2,
  INVALID_NODE_ACCOUNT = 3,
  TRANSACTION_EXPIRED = 4,
  INVALID_TRANSACTION_START = 5,
  INVALID_TRANSACTION_DURATION = 6,
  INVALID_SIGNATURE = 7,
  MEMO_TOO_LONG = 8,
  INSUFFICIENT_TX_FEE = 9,
  INSUFFICIENT_PAYER_BALANCE = 10,
  DUPLICATE_TRANSACTION = 11,
  BUSY = 12,
  NOT_SUPPORTED = 13,
  INVALID_FILE_ID = 14,
  INVALID_ACCOUNT_ID = 15,
  INVALID_CONTRACT_ID = 16,
  INVALID_TRANSACTION_ID = 17,
  RECEIPT_NOT_FOUND = 18,
  RECORD_NOT_FOUND = 19,
  INVALID_SOLIDITY_ID = 20,
  UNKNOWN = 21,
  SUCCESS = 22,
  FAIL_INVALID = 23,
  FAIL_FEE = 24,
  FAIL_BALANCE = 25,
  KEY_REQUIRED = 26,
  BAD_ENCODING = 27,
  INSUFFICIENT_ACCOUNT_BALANCE = 28,
  INVALID_PAYER_SIGNATURE = 43,
  KEY_NOT_PROVIDED = 44,
  INVALID_EXPIRATION_TIME = 45,
  PLATFORM_TRANSACTION_NOT_CREATED = 49,
  INVALID_TOPIC_ID = 150,
  PLATFORM_NOT_ACTIVE = 184,
  THROTTLED_AT_CONSENSUS = 366,
}

export function statusName(status: Status): string {
  return Status[status] ?? `STATUS_${status}`;
}
