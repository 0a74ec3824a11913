/**
 * SPDX-License-Identifier: Apache-2.0
 */
export type Sentiment = 'neutral' | 'positive' | 'negative';

export const SENTIMENT_CODES: Readonly<Record<Sentiment, number>> = Object.freeze({
    neutral: 0,
    positive: 1,
    negative: 2,
});

export type HashInput = string | Uint8Array;
export type IntegerInput = bigint | number | string;

export interface Skill {
    skill_id: string;
    skill_name: string;
    description: string;
    input_schema?: Record<string, unknown> | null;
    output_schema?: Record<string, unknown> | null;
}

export interface Endpoint {
    endpoint_type: string;
    url: string;
    name?: string | null;
    version?: string | null;
}

// records below mirror the backend's JSON and are passed through unvalidated
export interface AgentRecord {
    agent_id: number;
    owner_address: string;
    wallet_address?: string | null;
    name: string;
    description: string;
    version: string;
    token_uri: string;
    skills: Skill[];
    endpoints: Endpoint[];
    tags: string[];
    verified: boolean;
    verification_tier: string;
    active: boolean;
    total_validations: number;
    validations_completed: number;
    validations_rejected: number;
    total_feedback: number;
    feedback_positive: number;
    feedback_neutral: number;
    feedback_negative: number;
    registered_at: string;
    last_updated?: string | null;
}

export type ValidationStatus = 'pending' | 'completed' | 'rejected' | 'cancelled';

export interface ValidationRecord {
    request_id: string;
    request_data_hash?: string | null;
    requester_address: string;
    validator_address: string;
    agent_id: number;
    request_uri?: string | null;
    request_timestamp?: string | null;
    result_uri?: string | null;
    result_hash?: string | null;
    completed_at?: string | null;
    status: ValidationStatus;
}

export interface AgentSearchFilters {
    query?: string;
    skills?: string[];
    tags?: string[];
    minFeedbackPositive?: number;
    verifiedOnly?: boolean;
    limit?: number;
    offset?: number;
}

export interface AgentSearchPage {
    total: number;
    agents: AgentRecord[];
    offset: number;
    limit: number;
}

export interface AgentMetadataInput {
    name: string;
    description: string;
    version?: string;
    skills?: Skill[];
    endpoints?: Endpoint[];
    tags?: string[];
    // extra fields are hashed and uploaded with the metadata
    extra?: Record<string, unknown>;
}

export interface FeedbackOptions {
    value?: IntegerInput;
    valueDecimals?: number;
    tag1?: string;
    tag2?: string;
    endpoint?: string;
    feedbackUri?: string;
    feedbackHash?: HashInput;
    // hashed into feedbackHash when no explicit hash is given
    feedbackDocument?: Record<string, unknown>;
}

export interface ResponseOptions {
    clientAddress?: string;
    responseUri?: string;
    responseHash?: HashInput;
    responseDocument?: Record<string, unknown>;
}

export interface ValidationResultOptions {
    tag?: string;
    responseCode?: number;
}

export interface OnChainFeedback {
    client: string;
    feedbackText: string;
    sentiment: Sentiment;
    timestamp: Date;
    revoked: boolean;
    responseCount: number;
}

// status codes of the validation registry, in enum order
export const VALIDATION_STATUSES = Object.freeze(['pending', 'completed', 'rejected', 'cancelled'] as const);

export interface OnChainValidationRequest {
    requestId: string;
    agentId: bigint;
    requester: string;
    validator: string;
    requestUri: string;
    requestDataHash: string;
    resultUri: string;
    resultHash: string;
    status: ValidationStatus;
    createdAt: Date;
    // null while the request is open
    completedAt: Date | null;
}

export interface FeedbackSummary {
    total: number;
    active: number;
    revoked: number;
    positive: number;
    neutral: number;
    negative: number;
}

export interface ValidationSummary {
    total: number;
    pending: number;
    completed: number;
    rejected: number;
    cancelled: number;
}

export interface RegistrationResult {
    txHash: string;
    blockNumber: number | null;
    agentId: bigint | null;
    tokenUri: string;
    metadataHash: string;
}

export interface DocumentVerification {
    matches: boolean;
    computedHash: string;
    expectedHash: string;
}
