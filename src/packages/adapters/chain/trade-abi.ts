import type { Abi, AbiEvent } from 'viem';

/**
 * Trade event emitted by the shares contract on every buy and sell.
 * No input is indexed, so everything is decoded from the log data.
 */
export const TRADE_EVENT = {
  type: 'event',
  name: 'Trade',
  inputs: [
    { name: 'trader', type: 'address', indexed: false },
    { name: 'subject', type: 'address', indexed: false },
    { name: 'isBuy', type: 'bool', indexed: false },
    { name: 'shareAmount', type: 'uint256', indexed: false },
    { name: 'ethAmount', type: 'uint256', indexed: false },
    { name: 'protocolEthAmount', type: 'uint256', indexed: false },
    { name: 'subjectEthAmount', type: 'uint256', indexed: false },
    { name: 'supply', type: 'uint256', indexed: false },
  ],
} as const satisfies AbiEvent;

/**
 * Balance view of the shares contract
 */
export const SHARES_ABI = [
  {
    type: 'function',
    name: 'sharesBalance',
    stateMutability: 'view',
    inputs: [
      { name: 'sharesSubject', type: 'address' },
      { name: 'holder', type: 'address' },
    ],
    outputs: [{ name: '', type: 'uint256' }],
  },
] as const satisfies Abi;
