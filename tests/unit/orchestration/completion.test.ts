/**
 * End-to-end tests of a completion through the configured coordinator,
 * with the model endpoint and both agents served by msw
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, beforeEach, vi } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import { tmpdir } from 'os';
import { join } from 'path';
import { complete, createCoordinator } from '../../../src/orchestration/completion.js';
import type { Coordinator } from '../../../src/orchestration/Coordinator.js';
import { createGateway } from '../../../src/orchestration/gateways/createGateway.js';
import { GeneralPurposeAgentGateway } from '../../../src/orchestration/gateways/GeneralPurposeAgentGateway.js';
import { UsersAgentGateway } from '../../../src/orchestration/gateways/UsersAgentGateway.js';
import { ConfigSchema, type Config } from '../../../src/shared/config/schemas.js';
import { RequestCancelledError } from '../../../src/shared/utils/errors.js';
import { logger } from '../../../src/shared/utils/logger.js';
import type { ChoiceDelta, Message } from '../../../src/types/index.js';
import { completionChunk, sseBody, sseResponse } from '../../helpers/sse.js';

const LLM_URL = 'http://llm.test/openai/deployments/gpt-4o/chat/completions';
const UMS = 'http://ums.test';

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

const config: Config = ConfigSchema.parse({
  llm: { endpoint: 'http://llm.test', deployment: 'gpt-4o' },
  agents: { gpa: { endpoint: 'http://gpa.test' }, ums: { endpoint: UMS } },
  logging: { level: 'info', dir: join(tmpdir(), 'switchboard-test-logs'), console: false },
});

describe('complete()', () => {
  let coordinator: Coordinator;
  let createCalls: number;
  let synthesisCalls: number;
  let chatConversationIds: string[];

  beforeEach(() => {
    coordinator = createCoordinator(config);
    createCalls = 0;
    synthesisCalls = 0;
    chatConversationIds = [];

    server.use(
      http.post(LLM_URL, ({ request }) => {
        if (request.headers.get('accept')?.includes('text/event-stream')) {
          synthesisCalls++;
          return sseResponse(
            sseBody([
              completionChunk({ content: 'All ' }),
              completionChunk({ content: 'users listed.', finishReason: 'stop' }),
            ])
          );
        }
        return HttpResponse.json({
          choices: [
            {
              index: 0,
              message: { role: 'assistant', content: '{"agent_name":"UMS"}' },
              finish_reason: 'stop',
            },
          ],
        });
      }),
      http.post(`${UMS}/conversations`, () => {
        createCalls++;
        return HttpResponse.json({ id: `c-${createCalls}` });
      }),
      http.post(`${UMS}/conversations/:id/chat`, ({ params }) => {
        chatConversationIds.push(String(params.id));
        return sseResponse(sseBody([completionChunk({ content: 'Found 3 users', finishReason: 'stop' })]));
      })
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should route "List all users" to a new users agent conversation', async () => {
    const result = await complete(coordinator, {
      messages: [{ role: 'user', content: 'List all users' }],
    });

    expect(result.status).toBe('done');
    expect(result.decision).toEqual({ agentId: 'UMS' });
    expect(result.message.content).toBe('All users listed.');
    expect(result.message.customContent?.state).toEqual({ agent: 'UMS', conversationId: 'c-1' });
    expect(createCalls).toBe(1);
    expect(chatConversationIds).toEqual(['c-1']);
  });

  it('should reuse the conversation on the next turn', async () => {
    const history: Message[] = [
      { role: 'user', content: 'List all users' },
      {
        role: 'assistant',
        content: 'All users listed.',
        customContent: { state: { agent: 'UMS', conversationId: 'c-1' } },
      },
      { role: 'user', content: 'Delete the first user' },
    ];

    const result = await complete(coordinator, { messages: history });

    expect(createCalls).toBe(0);
    expect(chatConversationIds).toEqual(['c-1']);
    expect(result.message.customContent?.state).toEqual({ agent: 'UMS', conversationId: 'c-1' });
  });

  it('should forward deltas in order only for streaming requests', async () => {
    const streamed: ChoiceDelta[] = [];
    const onDelta = (delta: ChoiceDelta) => streamed.push(delta);

    await complete(
      coordinator,
      { messages: [{ role: 'user', content: 'List all users' }] },
      { onDelta }
    );
    expect(streamed).toEqual([]);

    const result = await complete(
      coordinator,
      { messages: [{ role: 'user', content: 'List all users' }], stream: true },
      { onDelta }
    );

    expect(streamed[0]).toEqual({
      type: 'stage',
      stage: { index: 0, name: 'Coordination', status: 'open' },
    });
    expect(streamed.filter((delta) => delta.type === 'content')).toEqual([
      { type: 'content', content: 'All ' },
      { type: 'content', content: 'users listed.' },
    ]);
    expect(streamed.at(-1)).toEqual({ type: 'content', content: 'users listed.' });
    expect(result.message.content).toBe('All users listed.');
  });

  it('should return an error message when the agent is unreachable', async () => {
    vi.spyOn(logger, 'error').mockImplementation(() => {});
    server.use(http.post(`${UMS}/conversations/:id/chat`, () => HttpResponse.error()));

    const result = await complete(coordinator, {
      messages: [{ role: 'user', content: 'List all users' }],
    });

    expect(result.status).toBe('delegation_failed');
    expect(result.message.content).toBe(
      'Sorry, the Users Management agent could not process your request right now. ' +
        'Please try again later.'
    );
    expect(result.message.customContent?.state).toBeUndefined();
    expect(synthesisCalls).toBe(0);
  });

  it('should return the agent response when synthesis fails', async () => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    server.use(
      http.post(LLM_URL, ({ request }) => {
        if (request.headers.get('accept')?.includes('text/event-stream')) {
          return HttpResponse.json({ error: { message: 'overloaded' } }, { status: 503 });
        }
        return HttpResponse.json({
          choices: [
            {
              index: 0,
              message: { role: 'assistant', content: '{"agent_name":"UMS"}' },
              finish_reason: 'stop',
            },
          ],
        });
      })
    );

    const result = await complete(coordinator, {
      messages: [{ role: 'user', content: 'List all users' }],
    });

    expect(result.status).toBe('synthesis_failed');
    expect(result.message.content).toBe('Found 3 users');
  });

  it('should reject when the request is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      complete(
        coordinator,
        { messages: [{ role: 'user', content: 'List all users' }] },
        { signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(RequestCancelledError);
    expect(createCalls).toBe(0);
  });
});

describe('createGateway()', () => {
  it('should build the gateway for each agent', () => {
    expect(createGateway('GPA', config.agents)).toBeInstanceOf(GeneralPurposeAgentGateway);
    expect(createGateway('UMS', config.agents)).toBeInstanceOf(UsersAgentGateway);
    expect(createGateway('UMS', config.agents).agentId).toBe('UMS');
  });
});
