/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { Client, SubmitOptions } from '../client';
import { SdkConfig } from '../config';
import {
    AgentMetadataInput,
    AgentRecord,
    AgentSearchFilters,
    AgentSearchPage,
    DocumentVerification,
    FeedbackOptions,
    FeedbackSummary,
    HashInput,
    IntegerInput,
    OnChainFeedback,
    OnChainValidationRequest,
    RegistrationResult,
    ResponseOptions,
    SENTIMENT_CODES,
    Sentiment,
    VALIDATION_STATUSES,
    ValidationRecord,
    ValidationResultOptions,
    ValidationStatus,
    ValidationSummary,
} from '../types/agent';
import { ContractError, errorMessage } from '../types/errors';
import { LedgerInvoker, TxResult } from '../types/ledger';
import { parseAgentRegisteredEvent } from '../utils/events';
import { computeDocumentHash, hashDocument, hashesMatch } from '../utils/hash';
import { Logger } from '../utils/logger';
import { RetryPolicy } from '../utils/retry';
import { validateAddress, validateAgentId, validateRequestId } from '../utils/validation';
import { shapeInvocation } from './callShaper';
import { ContentLoader, LoadOptions } from './contentLoader';
import { ContentStorage } from './contentStorage';
import { EthersLedgerInvoker } from './ethersLedgerInvoker';
import { OperationArgs, OperationName } from './operationRegistry';
import { RegistryApiClient, RegistryStats, ReputationReport } from './registryApi';

export interface AgentRegistryOptions {
    invoker: LedgerInvoker;
    api: RegistryApiClient;
    loader?: ContentLoader;
    storage?: ContentStorage;
    retryPolicy?: RetryPolicy;
}

const DEFAULT_AGENT_VERSION = '1.0.0';

function expectBigint(value: unknown, operation: string): bigint {
    if (typeof value === 'bigint') {
        return value;
    }
    if (typeof value === 'number' && Number.isInteger(value)) {
        return BigInt(value);
    }
    throw new ContractError(`Unexpected ${operation} result`, { operation, value: String(value) });
}

function expectCount(value: unknown, operation: string): number {
    return Number(expectBigint(value, operation));
}

function expectString(value: unknown, operation: string): string {
    if (typeof value !== 'string') {
        throw new ContractError(`Unexpected ${operation} result`, { operation, value: String(value) });
    }
    return value;
}

function expectBoolean(value: unknown, operation: string): boolean {
    if (typeof value !== 'boolean') {
        throw new ContractError(`Unexpected ${operation} result`, { operation, value: String(value) });
    }
    return value;
}

function expectTuple(value: unknown, operation: string, length: number): readonly unknown[] {
    if (!Array.isArray(value) || value.length < length) {
        throw new ContractError(`Unexpected ${operation} result`, { operation, expectedLength: length });
    }
    return value;
}

function sentimentFromCode(code: number): Sentiment {
    const entry = Object.entries(SENTIMENT_CODES).find(([, value]) => value === code);
    switch (entry?.[0]) {
        case 'positive':
            return 'positive';
        case 'negative':
            return 'negative';
        case 'neutral':
            return 'neutral';
        default:
            throw new ContractError(`Unknown sentiment code: ${code}`, { code });
    }
}

function statusFromCode(code: number): ValidationStatus {
    const status = VALIDATION_STATUSES[code];
    if (status === undefined) {
        throw new ContractError(`Unknown validation status code: ${code}`, { code });
    }
    return status;
}

function hashOf(explicit: HashInput | undefined, document: Record<string, unknown> | undefined): HashInput | undefined {
    if (explicit !== undefined) {
        return explicit;
    }
    return document ? computeDocumentHash(document) : undefined;
}

/**
 * Entry point combining the registry contracts, the indexing backend and
 * the content network. Writes go to the ledger; list and search reads go to
 * the backend; the verify* and get* ledger reads query the contracts
 * directly.
 */
export class AgentRegistry extends Client {
    readonly api: RegistryApiClient;
    readonly loader: ContentLoader;
    readonly storage: ContentStorage;

    constructor(options: AgentRegistryOptions) {
        super(options.invoker, options.retryPolicy);
        this.api = options.api;
        this.loader = options.loader ?? new ContentLoader({ retryPolicy: options.retryPolicy });
        this.storage = options.storage ?? new ContentStorage(this.loader, { retryPolicy: options.retryPolicy });
    }

    static fromConfig(config: SdkConfig): AgentRegistry {
        const loader = new ContentLoader({
            preferredGateway: config.ipfsGatewayUrl,
            timeoutMs: config.httpTimeoutMs,
            retryPolicy: config.retryPolicy,
        });

        return new AgentRegistry({
            invoker: new EthersLedgerInvoker(config),
            api: new RegistryApiClient({
                baseUrl: config.apiUrl,
                apiKey: config.apiKey,
                timeoutMs: config.httpTimeoutMs,
                retryPolicy: config.retryPolicy,
            }),
            loader,
            storage: new ContentStorage(loader, {
                uploadUrl: config.ipfsUploadUrl,
                timeoutMs: config.httpTimeoutMs,
                retryPolicy: config.retryPolicy,
            }),
            retryPolicy: config.retryPolicy,
        });
    }

    // ==================== identity ====================

    async registerAgent(metadata: AgentMetadataInput, options: SubmitOptions = {}): Promise<RegistrationResult> {
        const document: Record<string, unknown> = {
            name: metadata.name,
            description: metadata.description,
            version: metadata.version ?? DEFAULT_AGENT_VERSION,
            skills: metadata.skills ?? [],
            endpoints: metadata.endpoints ?? [],
            tags: metadata.tags ?? [],
            ...metadata.extra,
        };

        const { hash: metadataHash } = hashDocument(document);

        const tokenUri = this.storage.canUpload
            ? (await this.storage.upload(document, options.signal)).uri
            : await this.api.uploadDocument(document, options.signal);

        const tx = await this.submit(shapeInvocation('register', { tokenUri, metadataHash }), options);
        const agentId = parseAgentRegisteredEvent(tx.logs);

        Logger.info('Agent registered', { agentId, txHash: tx.txHash, tokenUri });

        if (agentId !== null) {
            await this.syncQuietly(agentId);
        } else {
            Logger.warn('AgentRegistered event not found in receipt', { txHash: tx.txHash });
        }

        return {
            txHash: tx.txHash,
            blockNumber: tx.blockNumber,
            agentId,
            tokenUri,
            metadataHash,
        };
    }

    async setAgentWallet(agentId: IntegerInput, wallet: string, options?: SubmitOptions): Promise<TxResult> {
        validateAddress(wallet, 'wallet');
        return this.write('setAgentWallet', { agentId: validateAgentId(agentId), wallet }, options);
    }

    // ==================== validation ====================

    async submitValidation(
        agentId: IntegerInput,
        validator: string,
        requestUri: string,
        requestData?: Record<string, unknown>,
        options?: SubmitOptions
    ): Promise<TxResult> {
        validateAddress(validator, 'validator');
        return this.write('validationRequest', {
            agentId: validateAgentId(agentId),
            validator,
            requestUri,
            requestDataHash: hashOf(undefined, requestData),
        }, options);
    }

    async completeValidation(
        requestId: HashInput,
        resultUri: string,
        resultData?: Record<string, unknown>,
        result: ValidationResultOptions = {},
        options?: SubmitOptions
    ): Promise<TxResult> {
        return this.write('completeValidation', {
            requestId: validateRequestId(requestId),
            resultUri,
            resultHash: hashOf(undefined, resultData),
            tag: result.tag,
            responseCode: result.responseCode,
        }, options);
    }

    async rejectValidation(
        requestId: HashInput,
        resultUri: string = '',
        reasonData?: Record<string, unknown>,
        result: ValidationResultOptions = {},
        options?: SubmitOptions
    ): Promise<TxResult> {
        return this.write('rejectValidation', {
            requestId: validateRequestId(requestId),
            resultUri,
            reasonHash: hashOf(undefined, reasonData),
            tag: result.tag,
            responseCode: result.responseCode,
        }, options);
    }

    async cancelValidation(requestId: HashInput, options?: SubmitOptions): Promise<TxResult> {
        return this.write('cancelRequest', { requestId: validateRequestId(requestId) }, options);
    }

    // ==================== reputation ====================

    async giveFeedback(
        agentId: IntegerInput,
        feedbackText: string,
        sentiment: Sentiment,
        feedback: FeedbackOptions = {},
        options?: SubmitOptions
    ): Promise<TxResult> {
        return this.write('giveFeedback', {
            agentId: validateAgentId(agentId),
            feedbackText,
            sentiment,
            value: feedback.value,
            valueDecimals: feedback.valueDecimals,
            tag1: feedback.tag1,
            tag2: feedback.tag2,
            endpoint: feedback.endpoint,
            feedbackUri: feedback.feedbackUri,
            feedbackHash: hashOf(feedback.feedbackHash, feedback.feedbackDocument),
        }, options);
    }

    async revokeFeedback(agentId: IntegerInput, feedbackIndex: IntegerInput, options?: SubmitOptions): Promise<TxResult> {
        return this.write('revokeFeedback', { agentId: validateAgentId(agentId), feedbackIndex }, options);
    }

    async respondToFeedback(
        agentId: IntegerInput,
        feedbackIndex: IntegerInput,
        responseText: string,
        response: ResponseOptions = {},
        options?: SubmitOptions
    ): Promise<TxResult> {
        return this.write('appendResponse', {
            agentId: validateAgentId(agentId),
            feedbackIndex,
            responseText,
            clientAddress: response.clientAddress,
            responseUri: response.responseUri,
            responseHash: hashOf(response.responseHash, response.responseDocument),
        }, options);
    }

    // ==================== backend reads ====================

    async getAgent(agentId: IntegerInput): Promise<AgentRecord> {
        return this.api.getAgent(agentId);
    }

    async searchAgents(filters: AgentSearchFilters = {}): Promise<AgentSearchPage> {
        return this.api.searchAgents(filters);
    }

    async getReputation(agentId: IntegerInput): Promise<ReputationReport> {
        return this.api.getReputation(agentId);
    }

    async getValidations(agentId: IntegerInput, limit?: number): Promise<ValidationRecord[]> {
        return this.api.getValidations(agentId, limit);
    }

    async getStats(): Promise<RegistryStats> {
        return this.api.getStats();
    }

    // ==================== ledger reads ====================

    async verifyOwnership(agentId: IntegerInput): Promise<string> {
        return expectString(await this.query('ownerOf', { agentId: validateAgentId(agentId) }), 'ownerOf');
    }

    async verifyAgentExists(agentId: IntegerInput): Promise<boolean> {
        return expectBoolean(await this.query('exists', { agentId: validateAgentId(agentId) }), 'exists');
    }

    async getTokenUri(agentId: IntegerInput): Promise<string> {
        return expectString(await this.query('tokenURI', { agentId: validateAgentId(agentId) }), 'tokenURI');
    }

    async getAgentWallet(agentId: IntegerInput): Promise<string> {
        return expectString(await this.query('agentWalletOf', { agentId: validateAgentId(agentId) }), 'agentWalletOf');
    }

    async getTotalAgents(): Promise<bigint> {
        return expectBigint(await this.query('totalAgents', {}), 'totalAgents');
    }

    async getAgentRequests(agentId: IntegerInput): Promise<string[]> {
        const value = await this.query('getAgentRequests', { agentId: validateAgentId(agentId) });
        if (!Array.isArray(value)) {
            throw new ContractError('Unexpected getAgentRequests result', { operation: 'getAgentRequests' });
        }
        return value.map((requestId: unknown) => expectString(requestId, 'getAgentRequests'));
    }

    async getValidationRequest(requestId: HashInput): Promise<OnChainValidationRequest> {
        const operation = 'getRequest';
        const id = validateRequestId(requestId);
        const [agentId, requester, validator, requestUri, requestDataHash, resultUri, resultHash, status, createdAt, completedAt] =
            expectTuple(await this.query(operation, { requestId: id }), operation, 10);
        const completedSeconds = expectCount(completedAt, operation);

        return {
            requestId: id,
            agentId: expectBigint(agentId, operation),
            requester: expectString(requester, operation),
            validator: expectString(validator, operation),
            requestUri: expectString(requestUri, operation),
            requestDataHash: expectString(requestDataHash, operation),
            resultUri: expectString(resultUri, operation),
            resultHash: expectString(resultHash, operation),
            status: statusFromCode(expectCount(status, operation)),
            createdAt: new Date(expectCount(createdAt, operation) * 1000),
            completedAt: completedSeconds > 0 ? new Date(completedSeconds * 1000) : null,
        };
    }

    async getValidationSummary(agentId: IntegerInput): Promise<ValidationSummary> {
        const operation = 'getSummaryForAgent';
        const [total, pending, completed, rejected, cancelled] = expectTuple(
            await this.query(operation, { agentId: validateAgentId(agentId) }),
            operation,
            5
        );

        return {
            total: expectCount(total, operation),
            pending: expectCount(pending, operation),
            completed: expectCount(completed, operation),
            rejected: expectCount(rejected, operation),
            cancelled: expectCount(cancelled, operation),
        };
    }

    async getFeedback(agentId: IntegerInput, feedbackIndex: IntegerInput): Promise<OnChainFeedback> {
        const operation = 'getFeedback';
        const [client, feedbackText, sentiment, timestamp, revoked, responseCount] = expectTuple(
            await this.query(operation, { agentId: validateAgentId(agentId), feedbackIndex }),
            operation,
            6
        );

        return {
            client: expectString(client, operation),
            feedbackText: expectString(feedbackText, operation),
            sentiment: sentimentFromCode(expectCount(sentiment, operation)),
            timestamp: new Date(expectCount(timestamp, operation) * 1000),
            revoked: expectBoolean(revoked, operation),
            responseCount: expectCount(responseCount, operation),
        };
    }

    async getFeedbackCount(agentId: IntegerInput): Promise<number> {
        return expectCount(await this.query('getFeedbackCount', { agentId: validateAgentId(agentId) }), 'getFeedbackCount');
    }

    async getFeedbackSummary(agentId: IntegerInput): Promise<FeedbackSummary> {
        const operation = 'getSummary';
        const [total, active, revoked, positive, neutral, negative] = expectTuple(
            await this.query(operation, { agentId: validateAgentId(agentId) }),
            operation,
            6
        );

        return {
            total: expectCount(total, operation),
            active: expectCount(active, operation),
            revoked: expectCount(revoked, operation),
            positive: expectCount(positive, operation),
            neutral: expectCount(neutral, operation),
            negative: expectCount(negative, operation),
        };
    }

    // ==================== integrity ====================

    /**
     * Loads the document at `uri`, recomputes its canonical hash and compares
     * it with `expectedHash` (case and `0x` prefix are ignored).
     */
    async verifyDocument(uri: string, expectedHash: string, options: LoadOptions = {}): Promise<DocumentVerification> {
        const document = await this.loader.loadDocument(uri, options);
        const computedHash = computeDocumentHash(document);
        const matches = hashesMatch(computedHash, expectedHash);

        if (!matches) {
            Logger.warn('Document hash mismatch', { uri, computedHash, expectedHash });
        }

        return { matches, computedHash, expectedHash };
    }

    private async write<K extends OperationName>(operation: K, args: OperationArgs[K], options?: SubmitOptions): Promise<TxResult> {
        return this.submit(shapeInvocation(operation, args), options);
    }

    private async query<K extends OperationName>(operation: K, args: OperationArgs[K]): Promise<unknown> {
        return this.read(shapeInvocation(operation, args));
    }

    private async syncQuietly(agentId: bigint): Promise<void> {
        try {
            await this.api.syncAgent(agentId);
        } catch (error) {
            // the backend catches up from chain events on its own
            Logger.warn('Backend sync failed after registration', { agentId, error: errorMessage(error) });
        }
    }
}
