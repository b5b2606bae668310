import sodium from "libsodium-wrappers";

export interface RecordedRequest {
  method: string;
  path: string;
  body: unknown;
  authorization: string | null;
}

export interface FakeGitHubOptions {
  /** `"<METHOD> <path>"` → HTTP status to answer with instead of success. */
  failures?: Record<string, number>;
  publicKey?: string;
  keyId?: string;
}

export interface FakeGitHub {
  fetch: typeof fetch;
  requests: RecordedRequest[];
  publicKey: Uint8Array;
  privateKey: Uint8Array;
  keyId: string;
  decrypt(encryptedValue: string): string;
}

const jsonHeaders = { "content-type": "application/json; charset=utf-8" };

/** In-process stand-in for the REST endpoints the provisioner calls. */
export async function createFakeGitHub(options: FakeGitHubOptions = {}): Promise<FakeGitHub> {
  await sodium.ready;
  const keyPair = sodium.crypto_box_keypair();
  const keyId = options.keyId ?? "key-123";
  // the API is allowed to omit base64 padding
  const advertisedKey =
    options.publicKey ?? sodium.to_base64(keyPair.publicKey, sodium.base64_variants.ORIGINAL).replace(/=+$/, "");
  const requests: RecordedRequest[] = [];

  const fakeFetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === "string" || input instanceof URL ? input : input.url);
    const method = (init?.method ?? "GET").toUpperCase();
    const path = decodeURIComponent(url.pathname);
    const body = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    const authorization = new Headers(init?.headers).get("authorization");
    requests.push({ method, path, body, authorization });

    const failureStatus = options.failures?.[`${method} ${path}`];
    if (failureStatus !== undefined) {
      return new Response(JSON.stringify({ message: `Simulated failure ${failureStatus}` }), {
        status: failureStatus,
        headers: jsonHeaders
      });
    }

    if (method === "GET" && path.endsWith("/actions/secrets/public-key")) {
      return new Response(JSON.stringify({ key: advertisedKey, key_id: keyId }), { status: 200, headers: jsonHeaders });
    }

    if (method === "POST" || path.includes("/contents/")) {
      return new Response(JSON.stringify({ ok: true }), { status: 201, headers: jsonHeaders });
    }

    return new Response(null, { status: 204 });
  };

  return {
    fetch: fakeFetch,
    requests,
    publicKey: keyPair.publicKey,
    privateKey: keyPair.privateKey,
    keyId,
    decrypt(encryptedValue) {
      const opened = sodium.crypto_box_seal_open(
        sodium.from_base64(encryptedValue, sodium.base64_variants.ORIGINAL),
        keyPair.publicKey,
        keyPair.privateKey
      );
      return sodium.to_string(opened);
    }
  };
}
