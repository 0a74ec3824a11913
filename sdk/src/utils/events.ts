/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import { LogEntry } from '../types/ledger';
import { Logger } from './logger';

export const AGENT_REGISTERED_EVENT = 'event AgentRegistered(uint256 indexed agentId, address indexed owner, string tokenURI)';

const identityEvents = new ethers.Interface([AGENT_REGISTERED_EVENT]);

function decode(log: LogEntry): ethers.LogDescription | null {
    try {
        return identityEvents.parseLog({ topics: [...log.topics], data: log.data });
    } catch (error) {
        Logger.warn('Skipping undecodable log', { topic: log.topics[0] ?? null, error: String(error) });
        return null;
    }
}

/**
 * Returns the agent id of the first AgentRegistered event in `logs`, or null
 * when the receipt carries none.
 */
export function parseAgentRegisteredEvent(logs: readonly LogEntry[]): bigint | null {
    for (const log of logs) {
        const parsed = decode(log);
        if (parsed?.name !== 'AgentRegistered') {
            continue;
        }

        const agentId: unknown = parsed.args.agentId;
        if (typeof agentId === 'bigint') {
            return agentId;
        }
    }

    return null;
}
