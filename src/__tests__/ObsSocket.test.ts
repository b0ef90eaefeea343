import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { UpstreamRequestError } from '../core/errors.js';
import { ObsSocket, authenticationString } from '../session/ObsSocket.js';
import { STANDING_SUBSCRIPTIONS, type TransportHandlers, type UpstreamData } from '../session/types.js';
import { FakeObsServer, type FakeObsOptions } from './helpers/fakeObs.js';

describe('ObsSocket', () => {
  let server: FakeObsServer | null = null;
  let socket: ObsSocket | null = null;
  let events: Array<[string, UpstreamData]>;
  let closes: string[];

  const handlers: TransportHandlers = {
    onEvent: (eventType, eventData) => events.push([eventType, eventData]),
    onClose: (reason) => closes.push(reason),
  };

  async function connect(options: FakeObsOptions = {}, password = ''): Promise<{ server: FakeObsServer; socket: ObsSocket }> {
    const started = await FakeObsServer.start(options);
    server = started;
    const created = new ObsSocket({ host: '127.0.0.1', port: started.port, password, requestTimeoutMs: 500 }, handlers);
    socket = created;
    return { server: started, socket: created };
  }

  beforeEach(() => {
    events = [];
    closes = [];
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    await socket?.close();
    await server?.close();
    socket = null;
    server = null;
    vi.restoreAllMocks();
  });

  it('identifies with the requested event subscriptions', async () => {
    const { server, socket } = await connect();

    await socket.open(STANDING_SUBSCRIPTIONS);

    expect(server.identifies).toEqual([{ rpcVersion: 1, eventSubscriptions: STANDING_SUBSCRIPTIONS }]);
  });

  it('answers the authentication challenge', async () => {
    const { server, socket } = await connect({ password: 'test-secret' }, 'test-secret');

    await socket.open(STANDING_SUBSCRIPTIONS);

    expect(server.identifies[0].authentication).toBe(
      authenticationString('test-secret', 'test-salt', 'test-challenge'),
    );
  });

  it('fails to open with a wrong password', async () => {
    const { socket } = await connect({ password: 'test-secret' }, 'wrong-secret');

    await expect(socket.open(STANDING_SUBSCRIPTIONS)).rejects.toThrow(
      'Connection closed during handshake: Authentication failed.',
    );
    expect(closes).toEqual([]);
  });

  it('fails to open when the handshake never completes', async () => {
    const { socket } = await connect({ silent: true });

    await expect(socket.open(STANDING_SUBSCRIPTIONS)).rejects.toThrow('Handshake timed out after 500ms');
  });

  it('fails to open when nothing is listening', async () => {
    const { server, socket } = await connect();
    await server.close();

    await expect(socket.open(STANDING_SUBSCRIPTIONS)).rejects.toThrow();
  });

  it('resolves requests with their response data', async () => {
    const { server, socket } = await connect({
      responses: { GetCurrentProgramScene: { ok: true, data: { currentProgramSceneName: 'Live' } } },
    });
    await socket.open(STANDING_SUBSCRIPTIONS);

    expect(await socket.request('GetCurrentProgramScene')).toEqual({ currentProgramSceneName: 'Live' });
    expect(await socket.request('SetInputMute', { inputName: 'Mic', inputMuted: true })).toEqual({});
    expect(server.requests).toEqual([
      { requestType: 'GetCurrentProgramScene', requestData: undefined },
      { requestType: 'SetInputMute', requestData: { inputName: 'Mic', inputMuted: true } },
    ]);
  });

  it('rejects failed requests with the upstream status', async () => {
    const { socket } = await connect({
      responses: { SetCurrentProgramScene: { ok: false, code: 600, comment: 'No source was found' } },
    });
    await socket.open(STANDING_SUBSCRIPTIONS);

    const error = await socket.request('SetCurrentProgramScene', { sceneName: 'Nope' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamRequestError);
    expect(error).toMatchObject({
      code: 'UpstreamError',
      statusCode: 600,
      message: 'SetCurrentProgramScene failed (600): No source was found',
    });
  });

  it('forwards upstream events', async () => {
    const { server, socket } = await connect();
    await socket.open(STANDING_SUBSCRIPTIONS);

    server.emit('MediaInputPlaybackEnded', { inputName: 'MediaSource' });

    await vi.waitFor(() => expect(events).toEqual([['MediaInputPlaybackEnded', { inputName: 'MediaSource' }]]));
  });

  it('reports a server-side close once identified', async () => {
    const { server, socket } = await connect();
    await socket.open(STANDING_SUBSCRIPTIONS);

    server.dropClients();

    await vi.waitFor(() => expect(closes).toEqual(['going away']));
  });

  it('does not report a close it initiated', async () => {
    const { server, socket } = await connect();
    await socket.open(STANDING_SUBSCRIPTIONS);

    await socket.close();

    await vi.waitFor(() => expect(server.clientCount).toBe(0));
    expect(closes).toEqual([]);
  });

  it('refuses requests before the session is identified', async () => {
    const { socket } = await connect();

    await expect(socket.request('GetVersion')).rejects.toMatchObject({ code: 'UpstreamUnavailable' });
  });
});

describe('authenticationString', () => {
  it('is deterministic for the same inputs', () => {
    const a = authenticationString('test-secret', 'salt-1', 'challenge-1');

    expect(authenticationString('test-secret', 'salt-1', 'challenge-1')).toBe(a);
    expect(authenticationString('test-secret', 'salt-1', 'challenge-2')).not.toBe(a);
    expect(a).toMatch(/^[A-Za-z0-9+/]{43}=$/);
  });
});
