import { Agent, fetch as undiciFetch } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpRequestInit {
  method: "GET";
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Agent;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export const httpFetch: FetchLike = (url, init) =>
  undiciFetch(url, {
    method: init.method,
    headers: init.headers,
    signal: init.signal,
    dispatcher: init.dispatcher,
    redirect: "follow",
  });
