/**
 * On-chain agent
 * Ethereum JSON-RPC over WebSocket (eth_subscribe):
 * - ERC-20 Transfer logs of the tracked tokens -> onchainTransfer
 * - pending transactions -> mempool (experimental)
 *
 * The feed selector lists pairs whose base is a tracked token (USDC-USD);
 * transfers are tagged with that pair, mempool events with the native pair.
 */

import { ConfigurationError, ProtocolError } from '../shared/errors';
import { FeatureToggles, JsonObject, JsonValue, RawEvent, SymbolSelector, isJsonObject } from '../shared/types';
import { WebSocketAgent } from './agent';
import tokenTable from './onchain-tokens.json';

export interface OnchainAgentOptions {
  selector: SymbolSelector;
  wsUrl: string;
  features: FeatureToggles;
  now?: () => number;
}

export interface TrackedToken {
  address: string;
  decimals: number;
}

interface TokenSubscription {
  pair: string;
  decimals: number;
}

type SubscriptionKind = 'mempool' | 'transfers';

const TOKENS: Readonly<Record<string, TrackedToken>> = tokenTable;

/** keccak256("Transfer(address,address,uint256)") */
export const TRANSFER_TOPIC = '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef';

const NATIVE_PAIR = 'ETH-USD';
const NATIVE_DECIMALS = 18;

const REQUEST_IDS: Readonly<Record<SubscriptionKind, number>> = { mempool: 1, transfers: 2 };

export function hexToBigInt(value: JsonValue | undefined): bigint | undefined {
  if (typeof value !== 'string' || !/^0x[0-9a-fA-F]+$/.test(value)) return undefined;
  return BigInt(value);
}

/** Integer token units as an exact decimal string, e.g. (1500000n, 6) -> "1.5" */
export function formatUnits(value: bigint, decimals: number): string {
  const negative = value < BigInt(0);
  const digits = (negative ? -value : value).toString().padStart(decimals + 1, '0');
  const whole = digits.slice(0, digits.length - decimals);
  const fraction = digits.slice(digits.length - decimals).replace(/0+$/, '');
  return `${negative ? '-' : ''}${whole}${fraction ? `.${fraction}` : ''}`;
}

function topicAddress(topic: JsonValue): string | undefined {
  return typeof topic === 'string' && topic.length >= 42 ? `0x${topic.slice(-40).toLowerCase()}` : undefined;
}

export class OnchainAgent extends WebSocketAgent {
  private readonly tokens = new Map<string, TokenSubscription>();
  private readonly subscriptions = new Map<string, SubscriptionKind>();

  constructor(options: OnchainAgentOptions) {
    super({
      name: `onchain:${options.selector === 'all' ? 'all' : options.selector.join(',')}`,
      venue: 'onchain',
      url: options.wsUrl,
      features: options.features,
      now: options.now,
    });

    const pairs =
      options.selector === 'all' ? Object.keys(TOKENS).map((symbol) => `${symbol}-USD`) : options.selector;
    for (const pair of pairs) {
      const [base, quote = 'USD'] = pair.toUpperCase().split('-');
      const token = TOKENS[base];
      if (!token) {
        throw new ConfigurationError(`no tracked token contract for onchain pair ${pair}`);
      }
      this.tokens.set(token.address.toLowerCase(), { pair: `${base}-${quote}`, decimals: token.decimals });
    }
  }

  protected subscriptionFrames(): JsonObject[] {
    this.subscriptions.clear();
    const frames: JsonObject[] = [];

    if (this.enabled('onchainTransfer')) {
      frames.push({
        jsonrpc: '2.0',
        id: REQUEST_IDS.transfers,
        method: 'eth_subscribe',
        params: ['logs', { address: [...this.tokens.keys()], topics: [TRANSFER_TOPIC] }],
      });
    }
    if (this.enabled('mempool')) {
      frames.push({
        jsonrpc: '2.0',
        id: REQUEST_IDS.mempool,
        method: 'eth_subscribe',
        params: ['newPendingTransactions', true],
      });
    }
    return frames;
  }

  protected decodeFrame(frame: JsonValue, receivedAt: number): RawEvent[] {
    if (!isJsonObject(frame)) {
      throw new ProtocolError('expected a JSON object frame', this.name);
    }
    if (isJsonObject(frame.error)) {
      throw new ProtocolError(`rpc error ${String(frame.error.code)}: ${String(frame.error.message)}`, this.name);
    }

    if (typeof frame.result === 'string' && typeof frame.id === 'number') {
      const kind = frame.id === REQUEST_IDS.mempool ? 'mempool' : frame.id === REQUEST_IDS.transfers ? 'transfers' : undefined;
      if (kind) this.subscriptions.set(frame.result, kind);
      return [];
    }

    if (frame.method !== 'eth_subscription' || !isJsonObject(frame.params)) return [];
    const { subscription, result } = frame.params;
    if (typeof subscription !== 'string') return [];

    switch (this.subscriptions.get(subscription)) {
      case 'mempool':
        return this.decodePendingTransaction(result, receivedAt);
      case 'transfers':
        return this.decodeTransferLog(result, receivedAt);
      default:
        return [];
    }
  }

  private decodePendingTransaction(result: JsonValue, receivedAt: number): RawEvent[] {
    // Nodes without full-transaction support send the bare hash
    if (typeof result === 'string') {
      return [this.rawEvent('mempool', { s: NATIVE_PAIR, hash: result }, receivedAt)];
    }
    if (!isJsonObject(result) || typeof result.hash !== 'string') return [];

    const wei = hexToBigInt(result.value);
    const payload: JsonObject = { s: NATIVE_PAIR, hash: result.hash };
    if (wei !== undefined) payload.value = formatUnits(wei, NATIVE_DECIMALS);
    return [this.rawEvent('mempool', payload, receivedAt)];
  }

  private decodeTransferLog(result: JsonValue, receivedAt: number): RawEvent[] {
    if (!isJsonObject(result) || typeof result.address !== 'string' || !Array.isArray(result.topics)) return [];

    const token = this.tokens.get(result.address.toLowerCase());
    const from = topicAddress(result.topics[1]);
    const to = topicAddress(result.topics[2]);
    const units = hexToBigInt(result.data);
    if (!token || result.topics[0] !== TRANSFER_TOPIC || !from || !to || units === undefined) return [];

    return [
      this.rawEvent(
        'onchainTransfer',
        {
          s: token.pair,
          transactionHash: result.transactionHash ?? null,
          from,
          to,
          amount: formatUnits(units, token.decimals),
        },
        receivedAt
      ),
    ];
  }
}
