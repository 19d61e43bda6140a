/** Walk nested objects and arrays by key or index. */
export function field(value: unknown, ...path: (string | number)[]): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Object.entries(current).find(([k]) => k === String(key))?.[1];
  }
  return current;
}

/** The JSON payload of every `data:` line in an SSE body. */
export function sseData(text: string): unknown[] {
  const payloads: unknown[] = [];
  for (const block of text.split('\n\n')) {
    const line = block.split('\n').find((l) => l.startsWith('data: '));
    if (line !== undefined) payloads.push(JSON.parse(line.slice(6)));
  }
  return payloads;
}

export function postJson(url: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

export function rpc(method: string, params: unknown, id: string | number = 1): Record<string, unknown> {
  return { jsonrpc: '2.0', id, method, params };
}
