import type { FetchFn } from "../../src/scraper/http.js";

export interface ScriptedResponse {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
  /** Reject instead of responding */
  error?: Error;
}

export type Route = (url: URL) => ScriptedResponse | ScriptedResponse[];

function toResponse(scripted: ScriptedResponse): Response {
  const body =
    typeof scripted.body === "string"
      ? scripted.body
      : JSON.stringify(scripted.body ?? null);
  return new Response(body, {
    status: scripted.status ?? 200,
    headers: scripted.headers,
  });
}

/**
 * In-process fetch stand-in. Each call is answered by the first route whose
 * matcher accepts the URL; an array answer is consumed one item per call
 * and its last item repeats.
 */
export function createFetchMock(
  routes: { match: (url: URL) => boolean; respond: Route }[]
): FetchFn & { calls: string[] } {
  const calls: string[] = [];
  const queues = new Map<number, ScriptedResponse[]>();

  const fetchFn: FetchFn = async (input) => {
    calls.push(input);
    const url = new URL(input);
    const index = routes.findIndex((route) => route.match(url));
    const route = routes[index];
    if (route === undefined) {
      return new Response("not found", { status: 404 });
    }

    let scripted: ScriptedResponse | undefined;
    const answer = route.respond(url);
    if (Array.isArray(answer)) {
      const queue = queues.get(index) ?? [...answer];
      scripted = queue.length > 1 ? queue.shift() : queue[0];
      queues.set(index, queue);
    } else {
      scripted = answer;
    }

    if (scripted === undefined) {
      return new Response("not found", { status: 404 });
    }
    if (scripted.error !== undefined) {
      throw scripted.error;
    }
    return toResponse(scripted);
  };

  return Object.assign(fetchFn, { calls });
}
