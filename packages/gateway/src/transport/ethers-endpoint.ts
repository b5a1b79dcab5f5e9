/**
 * Endpoint Transport - ethers.js implementation
 *
 * Binds the Transport interface to an on-chain endpoint contract. The signer
 * attached to the runner is the user-application identity the endpoint sees.
 *
 * Implements:
 * - send (payable, returns as soon as the tx is broadcast)
 * - estimateFees / getConfig (static calls)
 * - setConfig / setSendVersion / setReceiveVersion / forceResumeReceive
 *   (wait for confirmation, revert = TransportError)
 * - relay: inbound deliveries posted by the endpoint's relayer. Only a holder
 *   of a relay token delivers as the endpoint.
 */

import { BytesLike, ethers } from 'ethers';
import { ChainId, EvmAddress, evmAddress, nonce as toNonce, toBytes } from '../boundaries/index.js';
import { TransportError } from '../errors/index.js';
import type { DispatchRequest, FeeQuote, InboundReceiver, SendReceipt, Transport } from './types.js';

// =============================================================================
// ENDPOINT ABI (minimal, only what we need)
// =============================================================================

export const ENDPOINT_ABI = [
  'function send(uint16 _dstChainId, bytes _destination, bytes _payload, address _refundAddress, address _zroPaymentAddress, bytes _adapterParams) payable',
  'function estimateFees(uint16 _dstChainId, address _userApplication, bytes _payload, bool _payInZRO, bytes _adapterParam) view returns (uint256 nativeFee, uint256 zroFee)',
  'function getConfig(uint16 _version, uint16 _chainId, address _userApplication, uint256 _configType) view returns (bytes)',
  'function setConfig(uint16 _version, uint16 _chainId, uint256 _configType, bytes _config)',
  'function setSendVersion(uint16 _version)',
  'function setReceiveVersion(uint16 _version)',
  'function forceResumeReceive(uint16 _srcChainId, bytes _srcAddress)',
];

// =============================================================================
// ETHERS ENDPOINT TRANSPORT
// =============================================================================

export class EthersEndpointTransport implements Transport {
  readonly address: EvmAddress;
  private contract: ethers.Contract;
  private confirmationBlocks: number;
  private relayTokens: ReadonlySet<string>;
  private receiver?: InboundReceiver;

  constructor(
    endpointAddress: string,
    runner: ethers.ContractRunner,
    options?: {
      confirmationBlocks?: number;
      relayTokens?: Iterable<string>;
    }
  ) {
    this.address = evmAddress(endpointAddress);
    this.contract = new ethers.Contract(this.address, ENDPOINT_ABI, runner);
    this.confirmationBlocks = options?.confirmationBlocks ?? 1;
    this.relayTokens = new Set(options?.relayTokens ?? []);
  }

  // The signer is one application, so one receiver.
  attach(_application: EvmAddress, receiver: InboundReceiver): void {
    this.receiver = receiver;
  }

  acceptsRelayToken(token: string): boolean {
    return token !== '' && this.relayTokens.has(token);
  }

  /**
   * Hand a relayed delivery to the attached application. A delivery with an
   * unknown token carries no caller identity and the gateway refuses it.
   */
  async relay(
    token: string,
    srcChainId: number,
    srcAddress: BytesLike,
    nonce: bigint,
    payload: BytesLike
  ): Promise<void> {
    if (!this.receiver) {
      throw new TransportError('No application attached to the endpoint transport');
    }
    await this.receiver({
      caller: this.acceptsRelayToken(token) ? this.address : '',
      srcChainId,
      srcAddress: toBytes(srcAddress, 'srcAddress'),
      nonce: toNonce(nonce),
      payload: toBytes(payload, 'payload'),
    });
  }

  async send(request: DispatchRequest): Promise<SendReceipt> {
    const response: unknown = await this.contract.getFunction('send')(
      request.dstChainId,
      request.destination,
      request.payload,
      request.refundAddress,
      request.zroPaymentAddress,
      request.adapterParams,
      { value: request.nativeFee }
    );
    return { txHash: this.requireTx(response, 'send').hash };
  }

  async estimateFees(
    dstChainId: ChainId,
    userApplication: EvmAddress,
    payload: Uint8Array,
    payInZro: boolean,
    adapterParams: Uint8Array
  ): Promise<FeeQuote> {
    const result = await this.contract.getFunction('estimateFees').staticCall(
      dstChainId,
      userApplication,
      payload,
      payInZro,
      adapterParams
    );
    return {
      nativeFee: ethers.toBigInt(result[0]),
      zroFee: ethers.toBigInt(result[1]),
    };
  }

  async getConfig(
    version: number,
    chainId: ChainId,
    userApplication: EvmAddress,
    configType: number
  ): Promise<Uint8Array> {
    const config = await this.contract.getFunction('getConfig').staticCall(
      version,
      chainId,
      userApplication,
      configType
    );
    return ethers.getBytes(config);
  }

  async setConfig(version: number, chainId: ChainId, configType: number, config: Uint8Array): Promise<void> {
    await this.submitAndWait('setConfig', [version, chainId, configType, config]);
  }

  async setSendVersion(version: number): Promise<void> {
    await this.submitAndWait('setSendVersion', [version]);
  }

  async setReceiveVersion(version: number): Promise<void> {
    await this.submitAndWait('setReceiveVersion', [version]);
  }

  async forceResumeReceive(srcChainId: ChainId, srcAddress: Uint8Array): Promise<void> {
    await this.submitAndWait('forceResumeReceive', [srcChainId, srcAddress]);
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async submitAndWait(method: string, args: unknown[]): Promise<void> {
    const response: unknown = await this.contract.getFunction(method)(...args);
    const tx = this.requireTx(response, method);
    const receipt = await tx.wait(this.confirmationBlocks);
    if (!receipt || receipt.status !== 1) {
      throw new TransportError(`Endpoint ${method} reverted`, { txHash: tx.hash });
    }
  }

  private requireTx(response: unknown, method: string): ethers.ContractTransactionResponse {
    if (!(response instanceof ethers.ContractTransactionResponse)) {
      throw new TransportError(`Endpoint ${method} did not return a transaction`);
    }
    return response;
  }
}

// =============================================================================
// FACTORY FUNCTION
// =============================================================================

/**
 * Create an endpoint transport signing with a private key.
 */
export function createEndpointTransport(
  rpcUrl: string,
  endpointAddress: string,
  privateKey: string,
  options?: {
    confirmationBlocks?: number;
    relayTokens?: Iterable<string>;
  }
): EthersEndpointTransport {
  const provider = new ethers.JsonRpcProvider(rpcUrl);
  const wallet = new ethers.Wallet(privateKey, provider);
  return new EthersEndpointTransport(endpointAddress, wallet, options);
}
