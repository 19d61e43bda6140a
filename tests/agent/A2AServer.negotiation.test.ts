import { describe, it, expect } from 'vitest';
import { A2AServer } from '../../src/agent/A2AServer.js';
import type { CallContext } from '../../src/types/handler.js';
import { rejectedA2AError } from '../helpers/errors.js';
import { deferred, userMessage } from '../helpers/executors.js';
import { testCard } from '../helpers/fixtures.js';

const TRACE = 'https://ext.example.com/trace/v1';
const GEO = 'https://ext.example.com/geo/v1';

function server(onExtensions?: (extensions: string[]) => void): A2AServer {
  const card = {
    ...testCard({ streaming: true, extensions: [{ uri: TRACE, required: true }, { uri: GEO }] }),
    supportedVersions: ['0.2', '0.3'],
  };
  return new A2AServer({
    card,
    env: {},
    executor: {
      async execute(context) {
        onExtensions?.(context.extensions);
      },
    },
  });
}

describe('A2AServer negotiation', () => {
  it('accepts a supported version and an undeclared one', async () => {
    const a2a = server();
    await expect(a2a.listTasks({}, { version: '0.2', extensions: [TRACE] })).resolves.toMatchObject({ totalSize: 0 });
    await expect(a2a.listTasks({}, { extensions: [TRACE] })).resolves.toMatchObject({ totalSize: 0 });
  });

  it('rejects a version the agent does not support', async () => {
    const a2a = server();
    const err = await rejectedA2AError(a2a.listTasks({}, { version: '9.9', extensions: [TRACE] }));
    expect(err.reason).toBe('VERSION_NOT_SUPPORTED');
    expect(err.data).toEqual({ requested: '9.9', supported: ['0.2', '0.3'] });
  });

  it('requires every required extension on every operation', async () => {
    const a2a = server();
    const send = await rejectedA2AError(a2a.sendMessage({ message: userMessage('m1', 'go') }));
    expect(send.reason).toBe('EXTENSION_SUPPORT_REQUIRED');
    expect(send.data).toEqual({ extensions: [TRACE] });

    const get = await rejectedA2AError(a2a.getTask({ id: 'any' }, { extensions: [GEO] }));
    expect(get.reason).toBe('EXTENSION_SUPPORT_REQUIRED');
  });

  it('activates only the declared extensions the agent knows', async () => {
    const seen = deferred<string[]>();
    const a2a = server((extensions) => seen.resolve(extensions));
    const call: CallContext = { extensions: [TRACE, 'https://unknown.example.com/x', GEO] };

    await a2a.sendMessage({ message: userMessage('m1', 'go') }, call);

    expect(call.activatedExtensions).toEqual([TRACE, GEO]);
    expect(await seen.promise).toEqual([TRACE, GEO]);
  });
});
