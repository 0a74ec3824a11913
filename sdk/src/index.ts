/**
 * SPDX-License-Identifier: Apache-2.0
 */
// registry facade
export { AgentRegistry, AgentRegistryOptions } from './modules/agentRegistry';
export { Client, SubmitOptions } from './client';

// ledger
export { EthersLedgerInvoker, EthersLedgerInvokerConfig, DEFAULT_RECEIPT_TIMEOUT_MS } from './modules/ethersLedgerInvoker';
export { shapeInvocation, selectLayout, isReadOperation } from './modules/callShaper';
export * from './modules/operationRegistry';

// backend, content network and agent-to-agent clients
export * from './modules/registryApi';
export * from './modules/contentLoader';
export * from './modules/contentStorage';
export * from './modules/agentProtocol';

// types
export * from './types/agent';
export * from './types/ledger';
export * from './types/errors';

// config
export * from './config';

// utils
export * from './utils/canonicalize';
export * from './utils/hash';
export * from './utils/retry';
export * from './utils/events';
export * from './utils/validation';
export { fetchWithTimeout, ensureOk, readJsonBody, ResponseReader, DEFAULT_HTTP_TIMEOUT_MS } from './utils/fetchWithTimeout';
export { Logger, LogMeta } from './utils/logger';
