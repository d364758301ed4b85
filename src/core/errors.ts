/**
 * Collection platform errors
 * Every failure aborts the whole call; the code tells callers why
 */

/**
 * Error codes for collection, factory and manager operations
 */
export enum CollectionErrorCode {
  // validation
  INVALID_ITEM_ID = 'INVALID_ITEM_ID',
  INVALID_ISSUED_ID = 'INVALID_ISSUED_ID',
  INVALID_TOKEN_ID = 'INVALID_TOKEN_ID',
  INVALID_RARITY = 'INVALID_RARITY',
  INVALID_TOTAL_SUPPLY = 'INVALID_TOTAL_SUPPLY',
  INVALID_PRICE = 'INVALID_PRICE',
  INVALID_PRICE_AND_BENEFICIARY = 'INVALID_PRICE_AND_BENEFICIARY',
  EMPTY_METADATA = 'EMPTY_METADATA',
  CONTENT_HASH_SHOULD_BE_EMPTY = 'CONTENT_HASH_SHOULD_BE_EMPTY',
  INVALID_CONTENT_HASH = 'INVALID_CONTENT_HASH',
  LENGTH_MISMATCH = 'LENGTH_MISMATCH',
  INVALID_ADDRESS = 'INVALID_ADDRESS',
  INVALID_CREATOR_ADDRESS = 'INVALID_CREATOR_ADDRESS',
  INVALID_MINTER_ADDRESS = 'INVALID_MINTER_ADDRESS',
  INVALID_MANAGER_ADDRESS = 'INVALID_MANAGER_ADDRESS',
  INVALID_ALLOWANCE = 'INVALID_ALLOWANCE',
  INVALID_SALT = 'INVALID_SALT',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_TIME = 'INVALID_TIME',
  INVALID_NUMERIC_VALUE = 'INVALID_NUMERIC_VALUE',
  VALUE_IS_THE_SAME = 'VALUE_IS_THE_SAME',

  // state
  ALREADY_INITIALIZED = 'ALREADY_INITIALIZED',
  NOT_INITIALIZED = 'NOT_INITIALIZED',
  COLLECTION_COMPLETED = 'COLLECTION_COMPLETED',
  COLLECTION_ALREADY_COMPLETED = 'COLLECTION_ALREADY_COMPLETED',
  NOT_EDITABLE = 'NOT_EDITABLE',
  NOT_APPROVED = 'NOT_APPROVED',
  NOT_COMPLETED = 'NOT_COMPLETED',
  IN_GRACE_PERIOD = 'IN_GRACE_PERIOD',
  ITEM_DOES_NOT_EXIST = 'ITEM_DOES_NOT_EXIST',
  NO_ACTIVE_CALL = 'NO_ACTIVE_CALL',
  CALL_IN_PROGRESS = 'CALL_IN_PROGRESS',

  // authorization
  CALLER_IS_NOT_OWNER = 'CALLER_IS_NOT_OWNER',
  CALLER_IS_NOT_CREATOR = 'CALLER_IS_NOT_CREATOR',
  CALLER_IS_NOT_OWNER_OR_CREATOR = 'CALLER_IS_NOT_OWNER_OR_CREATOR',
  CALLER_IS_NOT_CREATOR_OR_MANAGER = 'CALLER_IS_NOT_CREATOR_OR_MANAGER',
  CALLER_CAN_NOT_MINT = 'CALLER_CAN_NOT_MINT',
  UNAUTHORIZED_SENDER = 'UNAUTHORIZED_SENDER',
  SIGNER_AND_SIGNATURE_DO_NOT_MATCH = 'SIGNER_AND_SIGNATURE_DO_NOT_MATCH',
  TRANSFER_CALLER_NOT_OWNER_NOR_APPROVED = 'TRANSFER_CALLER_NOT_OWNER_NOR_APPROVED',
  APPROVE_CALLER_NOT_OWNER_NOR_APPROVED_FOR_ALL = 'APPROVE_CALLER_NOT_OWNER_NOR_APPROVED_FOR_ALL',

  // exhaustion
  ITEM_EXHAUSTED = 'ITEM_EXHAUSTED',

  // addressing
  CREATION_FAILED = 'CREATION_FAILED',
  INVALID_IMPLEMENTATION = 'INVALID_IMPLEMENTATION',
  INVALID_COLLECTION = 'INVALID_COLLECTION',

  // ledger
  MINT_TO_ZERO_ADDRESS = 'MINT_TO_ZERO_ADDRESS',
  TOKEN_ALREADY_MINTED = 'TOKEN_ALREADY_MINTED',
  NONEXISTENT_TOKEN = 'NONEXISTENT_TOKEN',
  BALANCE_QUERY_FOR_ZERO_ADDRESS = 'BALANCE_QUERY_FOR_ZERO_ADDRESS',
  INDEX_OUT_OF_BOUNDS = 'INDEX_OUT_OF_BOUNDS',
  TRANSFER_FROM_INCORRECT_OWNER = 'TRANSFER_FROM_INCORRECT_OWNER',
  TRANSFER_TO_ZERO_ADDRESS = 'TRANSFER_TO_ZERO_ADDRESS',
  TRANSFER_TO_NON_RECEIVER = 'TRANSFER_TO_NON_RECEIVER',
  APPROVAL_TO_CURRENT_OWNER = 'APPROVAL_TO_CURRENT_OWNER',
  APPROVE_TO_CALLER = 'APPROVE_TO_CALLER',

  // manager
  INVALID_ACCEPTED_TOKEN = 'INVALID_ACCEPTED_TOKEN',
  INVALID_COMMITTEE = 'INVALID_COMMITTEE',
  INVALID_FEES_COLLECTOR = 'INVALID_FEES_COLLECTOR',

  // nested calls
  CALL_FAILED = 'CALL_FAILED',
}

export type ErrorCategory =
  | 'validation'
  | 'state'
  | 'authorization'
  | 'exhaustion'
  | 'addressing'
  | 'ledger'
  | 'call';

const C = CollectionErrorCode;

const CATEGORIES: Record<CollectionErrorCode, ErrorCategory> = {
  [C.INVALID_ITEM_ID]: 'validation',
  [C.INVALID_ISSUED_ID]: 'validation',
  [C.INVALID_TOKEN_ID]: 'validation',
  [C.INVALID_RARITY]: 'validation',
  [C.INVALID_TOTAL_SUPPLY]: 'validation',
  [C.INVALID_PRICE]: 'validation',
  [C.INVALID_PRICE_AND_BENEFICIARY]: 'validation',
  [C.EMPTY_METADATA]: 'validation',
  [C.CONTENT_HASH_SHOULD_BE_EMPTY]: 'validation',
  [C.INVALID_CONTENT_HASH]: 'validation',
  [C.LENGTH_MISMATCH]: 'validation',
  [C.INVALID_ADDRESS]: 'validation',
  [C.INVALID_CREATOR_ADDRESS]: 'validation',
  [C.INVALID_MINTER_ADDRESS]: 'validation',
  [C.INVALID_MANAGER_ADDRESS]: 'validation',
  [C.INVALID_ALLOWANCE]: 'validation',
  [C.INVALID_SALT]: 'validation',
  [C.INVALID_CONFIG]: 'validation',
  [C.INVALID_TIME]: 'validation',
  [C.INVALID_NUMERIC_VALUE]: 'validation',
  [C.VALUE_IS_THE_SAME]: 'state',
  [C.ALREADY_INITIALIZED]: 'state',
  [C.NOT_INITIALIZED]: 'state',
  [C.COLLECTION_COMPLETED]: 'state',
  [C.COLLECTION_ALREADY_COMPLETED]: 'state',
  [C.NOT_EDITABLE]: 'state',
  [C.NOT_APPROVED]: 'state',
  [C.NOT_COMPLETED]: 'state',
  [C.IN_GRACE_PERIOD]: 'state',
  [C.ITEM_DOES_NOT_EXIST]: 'state',
  [C.NO_ACTIVE_CALL]: 'state',
  [C.CALL_IN_PROGRESS]: 'state',
  [C.CALLER_IS_NOT_OWNER]: 'authorization',
  [C.CALLER_IS_NOT_CREATOR]: 'authorization',
  [C.CALLER_IS_NOT_OWNER_OR_CREATOR]: 'authorization',
  [C.CALLER_IS_NOT_CREATOR_OR_MANAGER]: 'authorization',
  [C.CALLER_CAN_NOT_MINT]: 'authorization',
  [C.UNAUTHORIZED_SENDER]: 'authorization',
  [C.SIGNER_AND_SIGNATURE_DO_NOT_MATCH]: 'authorization',
  [C.TRANSFER_CALLER_NOT_OWNER_NOR_APPROVED]: 'authorization',
  [C.APPROVE_CALLER_NOT_OWNER_NOR_APPROVED_FOR_ALL]: 'authorization',
  [C.ITEM_EXHAUSTED]: 'exhaustion',
  [C.CREATION_FAILED]: 'addressing',
  [C.INVALID_IMPLEMENTATION]: 'addressing',
  [C.INVALID_COLLECTION]: 'addressing',
  [C.MINT_TO_ZERO_ADDRESS]: 'ledger',
  [C.TOKEN_ALREADY_MINTED]: 'ledger',
  [C.NONEXISTENT_TOKEN]: 'ledger',
  [C.BALANCE_QUERY_FOR_ZERO_ADDRESS]: 'ledger',
  [C.INDEX_OUT_OF_BOUNDS]: 'ledger',
  [C.TRANSFER_FROM_INCORRECT_OWNER]: 'ledger',
  [C.TRANSFER_TO_ZERO_ADDRESS]: 'ledger',
  [C.TRANSFER_TO_NON_RECEIVER]: 'ledger',
  [C.APPROVAL_TO_CURRENT_OWNER]: 'ledger',
  [C.APPROVE_TO_CALLER]: 'ledger',
  [C.INVALID_ACCEPTED_TOKEN]: 'validation',
  [C.INVALID_COMMITTEE]: 'validation',
  [C.INVALID_FEES_COLLECTOR]: 'validation',
  [C.CALL_FAILED]: 'call',
};

export function errorCategory(code: CollectionErrorCode): ErrorCategory {
  return CATEGORIES[code];
}

/**
 * Base error for every rejected call
 */
export class CollectionError extends Error {
  public readonly code: CollectionErrorCode;
  public readonly scope: string;
  public readonly category: ErrorCategory;

  constructor(code: CollectionErrorCode, scope: string, message: string = `${scope}: ${code}`) {
    super(message);
    this.name = 'CollectionError';
    this.code = code;
    this.scope = scope;
    this.category = errorCategory(code);
  }
}

/**
 * Thrown when a nested call (initializer, forwarded call, meta-transaction)
 * reverts. The inner error is kept as `cause`.
 */
export class CallFailedError extends CollectionError {
  constructor(scope: string, cause: unknown) {
    super(CollectionErrorCode.CALL_FAILED, scope);
    this.name = 'CallFailedError';
    this.cause = cause;
  }
}

/**
 * Throw a CollectionError unless `condition` holds
 */
export function ensure(
  condition: boolean,
  code: CollectionErrorCode,
  scope: string
): asserts condition {
  if (!condition) {
    throw new CollectionError(code, scope);
  }
}

export function isCollectionError(error: unknown, code?: CollectionErrorCode): error is CollectionError {
  return error instanceof CollectionError && (code === undefined || error.code === code);
}
