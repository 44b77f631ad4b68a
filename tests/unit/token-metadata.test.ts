import { beforeEach, describe, expect, it } from "vitest";
import { MemoryCacheStore } from "../../src/cache/memory-store.js";
import { CallRevertedError } from "../../src/rpc/client.js";
import { TokenMetadataService, loadKnownTokens } from "../../src/services/token-metadata.js";
import { InvalidTokenError } from "../../src/utils/errors.js";
import { FakeChain } from "../helpers/fake-chain.js";

const UNKNOWN = "0x00000000000000000000000000000000000000Cd";
const TOKEN_CALLS: Record<string, string> = { name: "Test Token", symbol: "TST", decimals: "9" };

describe("loadKnownTokens", () => {
  it("reads the bundled list", () => {
    const tokens = loadKnownTokens();
    expect(tokens["1"]?.find((token) => token.symbol === "USDC")).toEqual({
      address: "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48",
      name: "USD Coin",
      symbol: "USDC",
      decimals: 6,
    });
  });
});

describe("TokenMetadataService", () => {
  let chain: FakeChain;
  let store: MemoryCacheStore;
  let service: TokenMetadataService;

  beforeEach(() => {
    chain = new FakeChain({
      tip: 5_000,
      callValue: ({ fn }) => TOKEN_CALLS[fn.name] ?? null,
    });
    store = new MemoryCacheStore();
    service = new TokenMetadataService({
      client: chain,
      store,
      chainId: 1,
      knownTokens: {
        "1": [
          {
            address: "0x00000000000000000000000000000000000000Ee",
            name: "Known Token",
            symbol: "KNOWN",
            decimals: 18,
          },
        ],
      },
      retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 },
    });
  });

  it("resolves bundled tokens by symbol or address without the chain", async () => {
    const expected = {
      chainId: 1,
      address: "0x00000000000000000000000000000000000000ee",
      name: "Known Token",
      symbol: "KNOWN",
      decimals: 18,
    };
    expect(await service.get("known")).toEqual(expected);
    expect(await service.get("0x00000000000000000000000000000000000000EE")).toEqual(expected);
    expect(chain.requests.call).toEqual([]);
  });

  it("rejects unknown symbols", async () => {
    await expect(service.get("NOPE")).rejects.toThrow(InvalidTokenError);
    await expect(service.get("NOPE")).rejects.toThrow("Could not find token `NOPE`");
  });

  it("reads unknown tokens from the chain at the tip and stores them", async () => {
    const meta = await service.get(UNKNOWN);

    expect(meta).toEqual({
      chainId: 1,
      address: UNKNOWN.toLowerCase(),
      name: "Test Token",
      symbol: "TST",
      decimals: 9,
    });
    expect(chain.requests.call).toEqual([5_000, 5_000, 5_000]);
    expect(await store.getTokenMetadata(UNKNOWN)).toEqual(meta);

    await service.get(UNKNOWN);
    expect(chain.requests.call).toHaveLength(3);
  });

  it("prefers metadata already in the store", async () => {
    await store.saveTokenMetadata({
      chainId: 1,
      address: UNKNOWN,
      name: "Stored",
      symbol: "STO",
      decimals: 2,
    });

    expect((await service.get(UNKNOWN)).symbol).toBe("STO");
    expect(chain.requests.call).toEqual([]);
  });

  it("rejects addresses that do not answer the token calls", async () => {
    chain.failNext("call", new CallRevertedError("execution reverted"), 3);
    await expect(service.get(UNKNOWN)).rejects.toThrow(InvalidTokenError);
    expect(await store.getTokenMetadata(UNKNOWN)).toBeNull();
  });
});
