import {
  HttpStatusError,
  ResponseDecodeError,
  TransportError,
} from "../smoke/errors";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type ChatCompletionClientConfig = {
  url: string;
  apiKey?: string;
  fetch?: FetchFn;
};

/** Anything that can POST a chat-completion payload and hand back the decoded JSON. */
export interface ChatCompletionTransport {
  readonly url: string;
  complete(payload: object): Promise<unknown>;
}

// Local servers are often configured with this placeholder instead of a key
const NO_KEY = "not-needed";

export class ChatCompletionClient implements ChatCompletionTransport {
  readonly url: string;
  private readonly apiKey?: string;
  private readonly fetchFn: FetchFn;

  constructor(config: ChatCompletionClientConfig) {
    this.url = config.url;
    this.apiKey = config.apiKey;
    this.fetchFn = config.fetch ?? ((url, init) => fetch(url, init));
  }

  headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey && this.apiKey !== NO_KEY) headers["Authorization"] = `Bearer ${this.apiKey}`;
    return headers;
  }

  /**
   * Sends one POST with `payload` as the JSON body. No retries and no timeout
   * beyond what fetch applies itself.
   *
   * @throws TransportError when the request or body read fails
   * @throws HttpStatusError on a non-2xx status, with the response text attached
   * @throws ResponseDecodeError when the body is not JSON
   */
  async complete(payload: object): Promise<unknown> {
    let text: string;
    let res: Response;
    try {
      res = await this.fetchFn(this.url, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(payload),
      });
      text = await res.text();
    } catch (err) {
      throw new TransportError(this.url, err);
    }
    if (!res.ok) throw new HttpStatusError(res.status, res.statusText, text);
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new ResponseDecodeError(err);
    }
  }
}
