import { describe, it, expect, beforeEach } from 'vitest';
import {
  createPublicClient,
  custom,
  encodeAbiParameters,
  encodeEventTopics,
  encodeFunctionResult,
  numberToHex,
  type PublicClient,
} from 'viem';
import { BlockRangeChainAdapter } from '../../../../../src/packages/adapters/chain/BlockRangeChainAdapter.js';
import { SHARES_ABI, TRADE_EVENT } from '../../../../../src/packages/adapters/chain/trade-abi.js';
import { ChainQueryError } from '../../../../../src/utils/errors.js';
import { silentLogger } from '../../../../helpers/fixtures.js';

const CONTRACT = '0x00000000000000000000000000000000000000c0';
const TRADER = '0x00000000000000000000000000000000000000aa';
const SUBJECT = '0x00000000000000000000000000000000000000bb';
const TX_HASH = `0x${'ab'.repeat(32)}`;

interface RpcCall {
  method: string;
  params: unknown;
}

/**
 * JSON-RPC node stand-in answering the three calls the adapter makes
 */
class FakeNode {
  head = 250n;
  logs: unknown[] = [];
  balance = 0n;
  failure: Error | null = null;
  readonly calls: RpcCall[] = [];

  async request({ method, params }: RpcCall): Promise<unknown> {
    this.calls.push({ method, params });
    if (this.failure) throw this.failure;

    switch (method) {
      case 'eth_chainId':
        return '0x1';
      case 'eth_blockNumber':
        return numberToHex(this.head);
      case 'eth_getLogs':
        return this.logs;
      case 'eth_call':
        return encodeFunctionResult({
          abi: SHARES_ABI,
          functionName: 'sharesBalance',
          result: this.balance,
        });
      default:
        throw new Error(`Unexpected RPC method: ${method}`);
    }
  }
}

function tradeLog(isBuy: boolean, amount: bigint, logIndex: number) {
  return {
    address: CONTRACT,
    topics: encodeEventTopics({ abi: [TRADE_EVENT], eventName: 'Trade' }),
    data: encodeAbiParameters(TRADE_EVENT.inputs, [
      TRADER,
      SUBJECT,
      isBuy,
      amount,
      0n,
      0n,
      0n,
      0n,
    ]),
    blockNumber: numberToHex(150),
    blockHash: `0x${'cd'.repeat(32)}`,
    transactionHash: TX_HASH,
    transactionIndex: '0x0',
    logIndex: numberToHex(logIndex),
    removed: false,
  };
}

describe('BlockRangeChainAdapter', () => {
  let node: FakeNode;
  let adapter: BlockRangeChainAdapter;

  beforeEach(() => {
    node = new FakeNode();
    const client: PublicClient = createPublicClient({
      transport: custom({ request: (args: RpcCall) => node.request(args) }, { retryCount: 0 }),
      cacheTime: 0,
    });
    adapter = new BlockRangeChainAdapter(
      { name: 'monad', rpcUrl: 'http://localhost:0', contractAddress: CONTRACT, startBlock: 100n },
      { logger: silentLogger, client }
    );
  });

  it('starts at the configured block', () => {
    expect(adapter.initialCheckpoint()).toEqual({ position: 100n, cursorToken: null });
  });

  it('fetches a window of batch size past the checkpoint', async () => {
    node.logs = [tradeLog(true, 3n, 4), tradeLog(false, 1n, 5)];

    const result = await adapter.fetchBatch({ position: 100n, cursorToken: null });

    expect(result).toEqual({
      kind: 'batch',
      events: [
        {
          chain: 'monad',
          eventKey: `${TX_HASH}:4`,
          trader: TRADER,
          subject: SUBJECT,
          isBuy: true,
          amount: 3n,
          source: { txId: TX_HASH, sequence: '4', blockNumber: 150n },
        },
        {
          chain: 'monad',
          eventKey: `${TX_HASH}:5`,
          trader: TRADER,
          subject: SUBJECT,
          isBuy: false,
          amount: 1n,
          source: { txId: TX_HASH, sequence: '5', blockNumber: 150n },
        },
      ],
      skipped: 0,
      next: { position: 200n, cursorToken: null },
      window: { from: '100', to: '200' },
    });

    const getLogs = node.calls.find((call) => call.method === 'eth_getLogs');
    expect(getLogs?.params).toEqual([
      expect.objectContaining({ fromBlock: '0x64', toBlock: '0xc8' }),
    ]);
  });

  it('clamps the window to the chain head', async () => {
    const result = await adapter.fetchBatch({ position: 200n, cursorToken: null });

    expect(result).toMatchObject({
      kind: 'batch',
      events: [],
      next: { position: 250n },
      window: { from: '200', to: '250' },
    });
  });

  it('reports caught-up at the head', async () => {
    expect(await adapter.fetchBatch({ position: 250n, cursorToken: null })).toEqual({
      kind: 'caught-up',
      head: '250',
    });
  });

  it('does not call the node once the worker is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      adapter.fetchBatch({ position: 100n, cursorToken: null }, controller.signal)
    ).rejects.toThrow();
    expect(node.calls).toEqual([]);
  });

  it('propagates RPC failures from fetchBatch', async () => {
    node.failure = new Error('connection refused');

    await expect(adapter.fetchBatch({ position: 100n, cursorToken: null })).rejects.toThrow();
  });

  it('reads the live share balance', async () => {
    node.balance = 42n;

    expect(await adapter.getShareBalance(SUBJECT, TRADER)).toBe(42n);
  });

  it('rejects an invalid address before calling the node', async () => {
    await expect(adapter.getShareBalance('0x1234', TRADER)).rejects.toThrow(
      'Invalid subject address: 0x1234'
    );
    expect(node.calls).toEqual([]);
  });

  it('wraps balance call failures', async () => {
    node.failure = new Error('connection refused');

    await expect(adapter.getShareBalance(SUBJECT, TRADER)).rejects.toBeInstanceOf(ChainQueryError);
  });

  it('wraps connectivity check failures', async () => {
    node.failure = new Error('connection refused');

    await expect(adapter.checkConnectivity()).rejects.toThrow(/^RPC unreachable: /);
  });
});
