import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { URL } from 'node:url';
import { bytesToUtf8 } from '@conclave/core';
import type { EventStore } from '@conclave/core';
import {
  delegationChangeToJson,
  describeGovernanceConfig,
  GovernanceError,
  isProposalState,
  isVoteChoice,
  isWeightingMode,
  outcomeToJson,
  proposalToJson,
  receiptToJson,
} from '@conclave/protocol';
import type {
  AmountInput,
  GovernanceEngine,
  GovernanceErrorCategory,
  ParameterValue,
  ProposeParams,
} from '@conclave/protocol';
import type { Logger } from '../logger.js';

const MAX_BODY_BYTES = 1_000_000;
const PREFIX = ['api', 'governance'];
const DEFAULT_EVENT_LIMIT = 100;
const MAX_EVENT_LIMIT = 1000;

export interface ApiServerConfig {
  host: string;
  port: number;
}

export interface ApiRuntime {
  engine: GovernanceEngine;
  eventStore?: EventStore;
  getParams: () => Record<string, ParameterValue>;
  logger?: Logger;
}

type JsonBody = Record<string, unknown>;

/** Malformed request; answered with 400 INVALID_REQUEST. */
class RequestError extends Error {
  constructor(
    message: string,
    readonly status = 400,
    readonly code = 'INVALID_REQUEST',
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

const CATEGORY_STATUS: Record<GovernanceErrorCategory, number> = {
  validation: 400,
  authorization: 403,
  state: 409,
  temporal: 425,
  execution: 502,
};

export function statusForError(error: GovernanceError): number {
  return error.code === 'NotFound' ? 404 : CATEGORY_STATUS[error.category];
}

export class ApiServer {
  private server?: Server;

  constructor(
    private readonly config: ApiServerConfig,
    private readonly runtime: ApiRuntime,
  ) {}

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    const server = createServer((req, res) => {
      this.route(req, res).catch((error: unknown) => this.fail(res, error));
    });
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server) {
      return;
    }
    const server = this.server;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /** Bound address; the port differs from the configured one when it was 0. */
  address(): { host: string; port: number } | null {
    const info = this.server?.address();
    if (!info || typeof info === 'string') {
      return null;
    }
    const { address, port }: AddressInfo = info;
    return { host: address, port };
  }

  private async route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${this.config.host}`);
    const method = req.method ?? 'GET';
    const segments = splitPath(url.pathname);
    if (!segments || segments[0] !== PREFIX[0] || segments[1] !== PREFIX[1]) {
      sendNotFound(res);
      return;
    }
    const [resource, id, action, extra] = segments.slice(2);
    const depth = segments.length - 2;
    const { engine } = this.runtime;

    if (resource === 'config' && depth === 1 && method === 'GET') {
      sendJson(res, 200, { config: describeGovernanceConfig(engine.config) });
      return;
    }

    if (resource === 'params' && depth === 1 && method === 'GET') {
      sendJson(res, 200, { params: this.runtime.getParams() });
      return;
    }

    if (resource === 'events' && depth === 1 && method === 'GET') {
      await this.handleEvents(res, url);
      return;
    }

    if (resource === 'power' && depth === 2 && method === 'GET') {
      const at = parseOptionalInteger(url.searchParams.get('at'), 'at');
      const power = await engine.powerOf(id, at);
      sendJson(res, 200, { account: id, at: at ?? null, power: power.toString() });
      return;
    }

    if (resource === 'delegations' && method === 'POST') {
      if (depth === 1) {
        await this.handleDelegation(req, res, 'delegate');
        return;
      }
      if (depth === 2 && id === 'revoke') {
        await this.handleDelegation(req, res, 'revoke');
        return;
      }
    }

    if (resource === 'proposals') {
      if (depth === 1 && method === 'GET') {
        const state = url.searchParams.get('state');
        if (state !== null && !isProposalState(state)) {
          throw new RequestError(`unknown state: ${state}`);
        }
        const proposals = await engine.listProposals(state ?? undefined);
        sendJson(res, 200, { proposals: proposals.map(proposalToJson) });
        return;
      }
      if (depth === 1 && method === 'POST') {
        await this.handlePropose(req, res);
        return;
      }
      if (depth === 2 && method === 'GET') {
        sendJson(res, 200, { proposal: proposalToJson(await engine.getProposal(id)) });
        return;
      }
      if (depth === 3 && action === 'votes' && method === 'GET') {
        await engine.getProposal(id);
        sendJson(res, 200, { votes: engine.ledger.receiptsFor(id).map(receiptToJson) });
        return;
      }
      if (depth === 3 && action === 'votes' && method === 'POST') {
        await this.handleVote(req, res, id);
        return;
      }
      if (depth === 4 && action === 'votes' && method === 'GET') {
        sendJson(res, 200, { vote: receiptToJson(await engine.receiptOf(id, extra)) });
        return;
      }
      if (depth === 3 && method === 'POST') {
        if (action === 'finalize') {
          sendJson(res, 200, { outcome: outcomeToJson(await engine.finalize(id)) });
          return;
        }
        if (action === 'queue' || action === 'execute' || action === 'cancel') {
          const body = await readJsonBody(req);
          const actor = requireString(body, 'actor');
          const proposal =
            action === 'queue'
              ? await engine.queue(id, actor)
              : action === 'execute'
                ? await engine.execute(id, actor)
                : await engine.cancel(id, actor);
          sendJson(res, 200, { proposal: proposalToJson(proposal) });
          return;
        }
      }
    }

    sendNotFound(res);
  }

  private async handlePropose(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readJsonBody(req);
    const proposer = requireString(body, 'proposer');
    const weighting = optionalString(body, 'weighting');
    if (weighting !== undefined && !isWeightingMode(weighting)) {
      throw new RequestError(`unknown weighting mode: ${weighting}`);
    }
    const params: ProposeParams = {
      targets: requireStringArray(body, 'targets'),
      values: requireAmountArray(body, 'values'),
      payloads: requireStringArray(body, 'payloads'),
      description: requireString(body, 'description'),
      votingDelay: optionalNumber(body, 'votingDelay'),
      votingPeriod: optionalNumber(body, 'votingPeriod'),
      weighting,
    };
    const proposal = await this.runtime.engine.propose(proposer, params);
    sendJson(res, 201, { proposal: proposalToJson(proposal) });
  }

  private async handleVote(
    req: IncomingMessage,
    res: ServerResponse,
    proposalId: string,
  ): Promise<void> {
    const body = await readJsonBody(req);
    const voter = requireString(body, 'voter');
    const choice = requireString(body, 'choice');
    if (!isVoteChoice(choice)) {
      throw new GovernanceError('InvalidVote', `unknown vote choice: ${choice}`);
    }
    const reason = optionalString(body, 'reason');
    const receipt = await this.runtime.engine.vote(proposalId, voter, choice, reason);
    sendJson(res, 201, { vote: receiptToJson(receipt) });
  }

  private async handleDelegation(
    req: IncomingMessage,
    res: ServerResponse,
    kind: 'delegate' | 'revoke',
  ): Promise<void> {
    const body = await readJsonBody(req);
    const delegator = requireString(body, 'delegator');
    const delegate = requireString(body, 'delegate');
    const amount = requireAmount(body.amount, 'amount');
    const engine = this.runtime.engine;
    const change =
      kind === 'delegate'
        ? await engine.delegate(delegator, delegate, amount)
        : await engine.revoke(delegator, delegate, amount);
    sendJson(res, 200, { delegation: delegationChangeToJson(change) });
  }

  private async handleEvents(res: ServerResponse, url: URL): Promise<void> {
    const from = url.searchParams.get('from');
    const limit = parsePagination(url.searchParams.get('limit'), DEFAULT_EVENT_LIMIT, MAX_EVENT_LIMIT);
    const eventStore = this.runtime.eventStore;
    if (!eventStore) {
      const events = this.runtime.engine.events.list();
      const start = from ? events.findIndex((envelope) => envelope.hash === from) + 1 : 0;
      const page = events.slice(start, start + limit);
      sendJson(res, 200, { events: page, cursor: page[page.length - 1]?.hash ?? '' });
      return;
    }
    const { events, cursor } = await eventStore.getEventLogRange(from, limit);
    sendJson(res, 200, {
      events: events.map((bytes): unknown => JSON.parse(bytesToUtf8(bytes))),
      cursor,
    });
  }

  private fail(res: ServerResponse, error: unknown): void {
    if (error instanceof GovernanceError) {
      sendJson(res, statusForError(error), {
        error: {
          code: error.code,
          category: error.category,
          message: error.message,
          retryable: error.retryable,
          ...(error.details ? { details: error.details } : {}),
        },
      });
      return;
    }
    if (error instanceof RequestError) {
      sendJson(res, error.status, {
        error: { code: error.code, message: error.message },
      });
      return;
    }
    this.runtime.logger?.error('request failed: %s', String(error));
    sendJson(res, 500, { error: { code: 'INTERNAL_ERROR', message: 'internal error' } });
  }
}

async function readJsonBody(req: IncomingMessage): Promise<JsonBody> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buffer.length;
    if (total > MAX_BODY_BYTES) {
      throw new RequestError('payload too large', 413, 'PAYLOAD_TOO_LARGE');
    }
    chunks.push(buffer);
  }
  const raw = Buffer.concat(chunks).toString('utf8');
  if (!raw) {
    throw new RequestError('empty body');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new RequestError('invalid json');
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new RequestError('body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function sendJson(res: ServerResponse, status: number, body: Record<string, unknown>): void {
  res.statusCode = status;
  res.setHeader('content-type', 'application/json; charset=utf-8');
  res.end(JSON.stringify(body));
}

function sendNotFound(res: ServerResponse): void {
  sendJson(res, 404, { error: { code: 'NOT_FOUND', message: 'route not found' } });
}

function splitPath(pathname: string): string[] | null {
  try {
    return pathname.split('/').filter(Boolean).map((segment) => decodeURIComponent(segment));
  } catch {
    return null;
  }
}

function requireString(body: JsonBody, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new RequestError(`${field} is required`);
  }
  return value;
}

function optionalString(body: JsonBody, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new RequestError(`${field} must be a string`);
  }
  return value;
}

function optionalNumber(body: JsonBody, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new RequestError(`${field} must be a number`);
  }
  return value;
}

function requireStringArray(body: JsonBody, field: string): string[] {
  const value = body[field];
  if (!Array.isArray(value)) {
    throw new RequestError(`${field} must be an array`);
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw new RequestError(`${field}[${index}] must be a string`);
    }
    return item;
  });
}

function requireAmount(value: unknown, field: string): AmountInput {
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  throw new RequestError(`${field} must be a string or number`);
}

function requireAmountArray(body: JsonBody, field: string): AmountInput[] {
  const value = body[field];
  if (!Array.isArray(value)) {
    throw new RequestError(`${field} must be an array`);
  }
  return value.map((item, index) => requireAmount(item, `${field}[${index}]`));
}

function parseOptionalInteger(value: string | null, field: string): number | undefined {
  if (value === null || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new RequestError(`${field} must be an integer`);
  }
  return parsed;
}

function parsePagination(value: string | null, fallback: number, max: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    return fallback;
  }
  return Math.min(parsed, max);
}
