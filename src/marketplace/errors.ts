/**
 * Marketplace Errors
 *
 * Every rejected operation throws a MarketplaceError whose `code` tells
 * client tooling exactly what went wrong. Collaborator failures (ledger,
 * swap venue, relay, asset contract) are mapped onto these codes at the
 * marketplace boundary.
 */

export type MarketplaceErrorCode =
  | 'NotApprovedNFT'
  | 'NotTokenOwner'
  | 'NotActiveLocalListing'
  | 'NotActiveCrossChainListing'
  | 'DuplicateDelivery'
  | 'ListingNotActive'
  | 'InvalidPrice'
  | 'InvalidAddress'
  | 'InsufficientFunds'
  | 'ExcessFunds'
  | 'UnknownDestination'
  | 'UntrustedSender'
  | 'UnauthorizedRelay'
  | 'UnexpectedBridgeAsset'
  | 'MalformedPayload'
  | 'SwapFailed'
  | 'SlippageFloorRequired'
  | 'AssetTransferFailed'
  | 'RelayFailed'
  | 'Unauthorized'
  | 'InvalidConfiguration'
  | 'UnknownFailure'
  | 'UnknownDelivery'
  | 'FailureAlreadyResolved';

export class MarketplaceError extends Error {
  readonly code: MarketplaceErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: MarketplaceErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MarketplaceError';
    this.code = code;
    this.details = details;
  }
}

export function isMarketplaceError(error: unknown): error is MarketplaceError {
  return error instanceof MarketplaceError;
}

/**
 * Pass MarketplaceErrors through; wrap anything else under `fallback`,
 * keeping the collaborator's own code in `details.causeCode`.
 */
export function toMarketplaceError(error: unknown, fallback: MarketplaceErrorCode): MarketplaceError {
  if (error instanceof MarketplaceError) return error;
  const message = error instanceof Error ? error.message : String(error);
  const causeCode =
    error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return new MarketplaceError(fallback, message, causeCode ? { causeCode } : undefined, { cause: error });
}

const COLLABORATOR_CODES: Record<string, MarketplaceErrorCode> = {
  InsufficientBalance: 'InsufficientFunds',
  InsufficientFee: 'InsufficientFunds',
  InvalidAddress: 'InvalidAddress',
  UnknownChain: 'UnknownDestination',
  NonexistentAsset: 'AssetTransferFailed',
  NotOwner: 'AssetTransferFailed',
  NotApproved: 'AssetTransferFailed',
  DeadlineExpired: 'SwapFailed',
  TooLittleReceived: 'SwapFailed',
  NoPool: 'SwapFailed',
  InsufficientLiquidity: 'SwapFailed',
};

/**
 * Map an error that escaped a marketplace call. Known collaborator codes
 * become MarketplaceErrors; anything unrecognised is returned unchanged.
 */
export function fromCollaboratorError(error: unknown): unknown {
  if (error instanceof MarketplaceError) return error;
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    const mapped = COLLABORATOR_CODES[error.code];
    if (mapped) return toMarketplaceError(error, mapped);
  }
  return error;
}
