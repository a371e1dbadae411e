/**
 * Response doubles for unit tests. Only the members the core reads are
 * implemented.
 */

export function createMockResponse(status: number, body?: unknown): Response {
  const text = body === undefined ? '' : JSON.stringify(body);
  return {
    status,
    ok: status >= 200 && status < 300,
    json: jest.fn().mockResolvedValue(body),
    text: jest.fn().mockResolvedValue(text),
    arrayBuffer: jest.fn().mockResolvedValue(new TextEncoder().encode(text).buffer),
    headers: new Headers(),
  } as unknown as Response;
}

export function createBinaryResponse(status: number, bytes: Uint8Array): Response {
  return {
    status,
    ok: status >= 200 && status < 300,
    json: jest.fn().mockRejectedValue(new SyntaxError('Unexpected token in JSON')),
    text: jest.fn().mockResolvedValue(''),
    arrayBuffer: jest.fn().mockResolvedValue(
      bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength),
    ),
    headers: new Headers(),
  } as unknown as Response;
}

/**
 * Qualtrics-style page envelope.
 */
export function qualtricsPage(elements: unknown[], nextPage: string | null = null) {
  return { result: { elements, nextPage } };
}
