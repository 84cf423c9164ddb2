import express, { Express, NextFunction, Request, Response } from 'express';
import * as http from 'http';
import { CrossChainPurchaseRequest } from '../crosschain';
import { Devnet, DevnetChain } from '../devnet/devnet';
import { isAddress } from '../ledger';
import { jsonReplacer, logger, StructuredLogger } from '../logging/structured-logger';
import { isMarketplaceError, MarketEventType, MarketplaceError, MarketplaceErrorCode } from '../marketplace';

/**
 * MARKETPLACE HTTP API
 *
 * Thin JSON surface over a devnet: every route resolves a chain, calls the
 * marketplace and returns `{ success: true, ... }` or
 * `{ success: false, error, code }`. Amounts travel as decimal strings.
 * There is no authentication: the acting account is named in the body.
 */

export { jsonReplacer };

/** Malformed request input (HTTP 400). */
export class RequestError extends Error {
  readonly code = 'BadRequest';

  constructor(message: string) {
    super(message);
    this.name = 'RequestError';
  }
}

const STATUS_BY_CODE: Partial<Record<MarketplaceErrorCode, number>> = {
  Unauthorized: 403,
  UnauthorizedRelay: 403,
  UntrustedSender: 403,
  NotTokenOwner: 403,
  UnknownFailure: 404,
  UnknownDelivery: 404,
  InsufficientFunds: 402,
  NotActiveLocalListing: 409,
  NotActiveCrossChainListing: 409,
  ListingNotActive: 409,
  FailureAlreadyResolved: 409,
  DuplicateDelivery: 409,
  SwapFailed: 502,
  RelayFailed: 502,
  AssetTransferFailed: 502,
};

export function httpStatusFor(code: MarketplaceErrorCode): number {
  return STATUS_BY_CODE[code] ?? 400;
}

export function parseBigIntField(body: Record<string, unknown>, field: string): bigint {
  const raw = body[field];
  if (typeof raw === 'number' && Number.isSafeInteger(raw) && raw >= 0) return BigInt(raw);
  if (typeof raw === 'string' && /^\d+$/.test(raw.trim())) return BigInt(raw.trim());
  throw new RequestError(`${field} must be a non-negative integer (decimal string)`);
}

export function parseAddressField(body: Record<string, unknown>, field: string): string {
  const raw = body[field];
  if (!isAddress(raw)) {
    throw new RequestError(`${field} must be a 0x-prefixed 20-byte address`);
  }
  return raw.toLowerCase();
}

export function parseChainId(raw: unknown): number {
  const value = typeof raw === 'number' ? raw : Number(String(raw ?? '').trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new RequestError(`Invalid chain id: ${String(raw)}`);
  }
  return value;
}

export function parseEventType(raw: unknown): MarketEventType | undefined {
  if (raw === undefined || raw === '') return undefined;
  const types: string[] = Object.values(MarketEventType);
  const match = Object.values(MarketEventType).find(t => t === raw);
  if (!match) {
    throw new RequestError(`Unknown event type ${String(raw)}; expected one of ${types.join(', ')}`);
  }
  return match;
}

/** Status code and body for an error escaping a route. */
export function errorResponse(error: unknown): { status: number; body: { success: false; error: string; code: string } } {
  if (isMarketplaceError(error)) {
    return { status: httpStatusFor(error.code), body: { success: false, error: error.message, code: error.code } };
  }
  if (error instanceof RequestError) {
    return { status: 400, body: { success: false, error: error.message, code: error.code } };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { status: 500, body: { success: false, error: message, code: 'InternalError' } };
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  const fields: Record<string, unknown> = {};
  if (typeof body === 'object' && body !== null) {
    for (const [key, value] of Object.entries(body)) fields[key] = value;
  }
  return fields;
}

type Handler = (req: Request, res: Response) => Promise<void>;

export class MarketplaceAPIServer {
  private app: Express;
  private port: number;
  private devnet: Devnet;
  private httpServer?: http.Server;
  private log: StructuredLogger;

  constructor(devnet: Devnet, port: number) {
    this.devnet = devnet;
    this.port = port;
    this.app = express();
    this.log = logger.child({ service: 'api' });
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.set('json replacer', jsonReplacer);
    this.app.use(express.json({ limit: '256kb' }));

    this.app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', '*');
      res.header('Access-Control-Allow-Methods', 'GET, POST, PATCH, OPTIONS');
      res.header('Access-Control-Allow-Headers', 'Content-Type');

      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
      } else {
        next();
      }
    });
  }

  private route(handler: Handler): (req: Request, res: Response, next: NextFunction) => void {
    return (req, res, next) => {
      handler(req, res).catch((error: unknown) => {
        const { status, body } = errorResponse(error);
        if (status >= 500) {
          this.log.error('API', 'Request failed', { method: req.method, path: req.path, error: body.error });
        } else {
          this.log.debug('API', 'Request rejected', { method: req.method, path: req.path, code: body.code });
        }
        if (res.headersSent) {
          next(error);
          return;
        }
        res.status(status).json(body);
      });
    };
  }

  private chainOf(req: Request): DevnetChain {
    const chainId = parseChainId(req.params.chainId);
    try {
      return this.devnet.chain(chainId);
    } catch {
      throw new RequestError(`Unknown chain ${chainId}`);
    }
  }

  private setupRoutes(): void {
    this.app.get('/api/health', (_req: Request, res: Response) => {
      res.json({ success: true, status: 'ok', chains: this.devnet.chainIds() });
    });

    this.app.get(
      '/api/chains',
      this.route(async (_req, res) => {
        const chains = this.devnet.chainIds().map(id => {
          const chain = this.devnet.chain(id);
          return {
            chainId: chain.chainId,
            name: chain.name,
            marketplace: chain.marketplace.address,
            stableToken: chain.stableToken,
            wrappedNative: chain.ledger.wrappedNative,
            assetContract: chain.assets.address,
            relayEndpoint: chain.endpoint.address,
            feeBps: chain.marketplace.config.feeBps,
            conversion: chain.marketplace.config.conversionPolicy(),
            trustedPeers: chain.marketplace.config.trustedPeers(),
          };
        });
        res.json({ success: true, chains });
      })
    );

    // ------------------------------------------------------------
    // Accounts (devnet faucet and asset minting)
    // ------------------------------------------------------------

    this.app.get(
      '/api/chains/:chainId/accounts/:address',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const address = parseAddressField({ address: req.params.address }, 'address');
        res.json({
          success: true,
          address,
          native: chain.ledger.balanceOf(address),
          stable: chain.ledger.tokenBalanceOf(chain.stableToken, address),
        });
      })
    );

    this.app.post(
      '/api/chains/:chainId/faucet',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const account = parseAddressField(body, 'account');
        const amount = parseBigIntField(body, 'amount');
        await this.devnet.fund(chain.chainId, account, amount);
        res.json({ success: true, account, balance: chain.ledger.balanceOf(account) });
      })
    );

    this.app.post(
      '/api/chains/:chainId/assets',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const to = parseAddressField(body, 'to');
        const assetId = parseBigIntField(body, 'assetId');
        await this.devnet.mintAsset(chain.chainId, to, assetId);
        if (body.approveMarketplace === true) {
          await this.devnet.approveMarketplace(chain.chainId, to);
        }
        res.json({ success: true, assetContract: chain.assets.address, assetId, owner: to });
      })
    );

    this.app.post(
      '/api/chains/:chainId/approvals',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const holder = parseAddressField(bodyOf(req), 'holder');
        await this.devnet.approveMarketplace(chain.chainId, holder);
        res.json({ success: true, holder, operator: chain.marketplace.address });
      })
    );

    // ------------------------------------------------------------
    // Listings
    // ------------------------------------------------------------

    this.app.get(
      '/api/chains/:chainId/listings',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        res.json({ success: true, listings: chain.marketplace.activeListings() });
      })
    );

    this.app.get(
      '/api/chains/:chainId/listings/:key',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        res.json({ success: true, listing: chain.marketplace.getListing(String(req.params.key)) });
      })
    );

    this.app.post(
      '/api/chains/:chainId/listings',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const listing = await chain.marketplace.list(
          parseAddressField(body, 'caller'),
          parseAddressField(body, 'assetContract'),
          parseBigIntField(body, 'assetId'),
          parseBigIntField(body, 'price'),
          body.crossChain === true
        );
        res.status(201).json({ success: true, listing });
      })
    );

    this.app.patch(
      '/api/chains/:chainId/listings',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const listing = await chain.marketplace.editPrice(
          parseAddressField(body, 'caller'),
          parseAddressField(body, 'assetContract'),
          parseBigIntField(body, 'assetId'),
          parseBigIntField(body, 'price')
        );
        res.json({ success: true, listing });
      })
    );

    this.app.post(
      '/api/chains/:chainId/listings/delist',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const listing = await chain.marketplace.delist(
          parseAddressField(body, 'caller'),
          parseAddressField(body, 'assetContract'),
          parseBigIntField(body, 'assetId')
        );
        res.json({ success: true, listing });
      })
    );

    // ------------------------------------------------------------
    // Purchases
    // ------------------------------------------------------------

    this.app.post(
      '/api/chains/:chainId/purchases/local',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const buyer = parseAddressField(body, 'buyer');
        const receipt = await chain.marketplace.buyLocal(
          buyer,
          parseBigIntField(body, 'value'),
          parseAddressField(body, 'assetContract'),
          parseBigIntField(body, 'assetId'),
          body.recipient === undefined ? buyer : parseAddressField(body, 'recipient')
        );
        res.json({ success: true, receipt });
      })
    );

    this.app.post(
      '/api/chains/:chainId/purchases/crosschain/quote',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const quote = chain.marketplace.quotePurchase(this.crossChainRequest(bodyOf(req)));
        res.json({ success: true, quote });
      })
    );

    this.app.post(
      '/api/chains/:chainId/purchases/crosschain',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const receipt = await chain.marketplace.buyCrosschain(
          parseAddressField(body, 'buyer'),
          parseBigIntField(body, 'value'),
          this.crossChainRequest(body)
        );
        res.status(202).json({ success: true, receipt });
      })
    );

    // ------------------------------------------------------------
    // Relay
    // ------------------------------------------------------------

    this.app.get(
      '/api/relay/pending',
      this.route(async (_req, res) => {
        res.json({ success: true, packets: this.devnet.relay.pending() });
      })
    );

    this.app.get(
      '/api/relay/deliveries',
      this.route(async (_req, res) => {
        res.json({ success: true, deliveries: this.devnet.relay.getDeliveries() });
      })
    );

    this.app.post(
      '/api/relay/deliver',
      this.route(async (req, res) => {
        const messageId = bodyOf(req).messageId;
        const deliveries =
          typeof messageId === 'string'
            ? [await this.devnet.relay.deliver(messageId)]
            : await this.devnet.deliverAll();
        res.json({ success: true, deliveries });
      })
    );

    // ------------------------------------------------------------
    // Events, failures, fees
    // ------------------------------------------------------------

    this.app.get(
      '/api/chains/:chainId/events',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const type = parseEventType(req.query.type);
        const events = type ? chain.marketplace.events.getEventsByType(type) : chain.marketplace.events.getEvents();
        res.json({ success: true, events, chainValid: chain.marketplace.events.verifyHashChain() });
      })
    );

    this.app.get(
      '/api/chains/:chainId/failures',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        res.json({
          success: true,
          failures: chain.marketplace.getFinalizationFailures(),
          heldStable: chain.marketplace.heldStableBalance(),
        });
      })
    );

    this.app.get(
      '/api/chains/:chainId/failures/:failureId',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const failureId = String(req.params.failureId);
        const failure = chain.marketplace.getFailure(failureId);
        if (!failure) {
          throw new MarketplaceError('UnknownFailure', `No finalization failure ${failureId}`);
        }
        res.json({ success: true, failure });
      })
    );

    this.app.post(
      '/api/chains/:chainId/failures/:failureId/retry',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const outcome = await chain.marketplace.retryFinalization(
          parseAddressField(body, 'caller'),
          String(req.params.failureId),
          body.minOutputOverride === undefined ? {} : { minOutputOverride: parseBigIntField(body, 'minOutputOverride') }
        );
        res.json({ success: true, outcome });
      })
    );

    this.app.post(
      '/api/chains/:chainId/failures/:failureId/refund',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const failure = await chain.marketplace.refundFailure(
          parseAddressField(body, 'caller'),
          String(req.params.failureId),
          parseAddressField(body, 'to')
        );
        res.json({ success: true, failure });
      })
    );

    this.app.get(
      '/api/chains/:chainId/rejected-deliveries',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        res.json({ success: true, deliveries: chain.marketplace.getRejectedDeliveries() });
      })
    );

    this.app.post(
      '/api/chains/:chainId/rejected-deliveries/recover',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const amount = await chain.marketplace.recoverBridgedFunds(
          parseAddressField(body, 'caller'),
          parseAddressField(body, 'to'),
          typeof body.deliveryId === 'string' ? body.deliveryId : undefined
        );
        res.json({ success: true, amount });
      })
    );

    this.app.get(
      '/api/chains/:chainId/fees',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        res.json({ success: true, accrued: chain.marketplace.accruedFees() });
      })
    );

    this.app.post(
      '/api/chains/:chainId/fees/withdraw',
      this.route(async (req, res) => {
        const chain = this.chainOf(req);
        const body = bodyOf(req);
        const amount = await chain.marketplace.withdrawFees(
          parseAddressField(body, 'caller'),
          parseAddressField(body, 'to')
        );
        res.json({ success: true, amount });
      })
    );
  }

  private crossChainRequest(body: Record<string, unknown>): CrossChainPurchaseRequest {
    return {
      destChainId: parseChainId(body.destChainId),
      assetContract: parseAddressField(body, 'assetContract'),
      assetId: parseBigIntField(body, 'assetId'),
      recipient: parseAddressField(body, 'recipient'),
      price: parseBigIntField(body, 'price'),
      minStableOut: parseBigIntField(body, 'minStableOut'),
    };
  }

  async start(): Promise<void> {
    return new Promise(resolve => {
      this.httpServer = http.createServer(this.app);
      this.httpServer.listen(this.port, () => {
        this.log.info('API', 'Server listening', { port: this.port });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    this.httpServer = undefined;
    this.log.info('API', 'Server stopped');
  }
}
