import { VendorError } from "../../src/lib/errors.js";
import type { HttpMethod, VendorRequest, VendorResponse, VendorTransport } from "../../src/lib/vendor/transport.js";

export type FakeReply =
  | { json: unknown; status?: number }
  | { bytes: Uint8Array; contentType?: string }
  | { chunks: Uint8Array[] }
  | { error: VendorError };

interface Route {
  method: HttpMethod;
  path: string;
  replies: FakeReply[];
}

/**
 * In-process stand-in for the vendor API. Routes match on method and exact
 * path; a route registered with several replies answers them in order and
 * then keeps repeating the last one. Unrouted calls fail with a 404.
 */
export class FakeVendor implements VendorTransport {
  readonly requests: VendorRequest[] = [];
  private readonly routes: Route[] = [];

  on(method: HttpMethod, path: string, ...replies: FakeReply[]): this {
    this.routes.push({ method, path, replies });
    return this;
  }

  /** Requests sent to `path`, in order. */
  sentTo(path: string): VendorRequest[] {
    return this.requests.filter((r) => r.path === path);
  }

  private next(request: VendorRequest): FakeReply {
    this.requests.push(request);
    const route = this.routes.find((r) => r.method === request.method && r.path === request.path);
    const reply = route && (route.replies.length > 1 ? route.replies.shift() : route.replies[0]);
    if (!reply) {
      return { error: new VendorError(404, `No fake route for ${request.method} ${request.path}`) };
    }
    return reply;
  }

  async send(request: VendorRequest): Promise<VendorResponse> {
    const reply = this.next(request);
    if ("error" in reply) throw reply.error;
    if ("json" in reply) {
      return {
        status: reply.status ?? 200,
        contentType: "application/json",
        body: Buffer.from(JSON.stringify(reply.json), "utf8"),
      };
    }
    if ("bytes" in reply) {
      return { status: 200, contentType: reply.contentType ?? "audio/mpeg", body: reply.bytes };
    }
    return { status: 200, contentType: "audio/mpeg", body: Buffer.concat(reply.chunks) };
  }

  async stream(request: VendorRequest): Promise<AsyncIterable<Uint8Array>> {
    const reply = this.next(request);
    if ("error" in reply) throw reply.error;
    const chunks = "chunks" in reply ? reply.chunks : "bytes" in reply ? [reply.bytes] : [Buffer.from(JSON.stringify(reply.json))];
    return (async function* () {
      yield* chunks;
    })();
  }
}
