import { createLogger } from "@spigot/service-kit";
import { privateKeyToAccount } from "viem/accounts";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config.ts";
import { ConfigurationError } from "../src/errors.ts";
import { initializeFaucet } from "../src/init.ts";
import { FakeLedger, TEST_PRIVATE_KEY, TestClock } from "./helpers.ts";

const config = loadConfig({
  PRIVATE_KEY: TEST_PRIVATE_KEY,
  FAUCET_AMOUNT: "1000",
  COOLDOWN_HOURS: "1",
  LEDGER_TIMEOUT_MS: "50",
});

// Capture the init logger's JSON lines
let chunks: string[];

function logLines(): Array<Record<string, unknown>> {
  return chunks.filter((c) => c.startsWith("{")).map((c) => JSON.parse(c));
}

beforeEach(() => {
  chunks = [];
  process.env.LOG_LEVEL = "info";
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    chunks.push(String(chunk));
    return true;
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  process.env.LOG_LEVEL = "error";
});

const logger = () => createLogger("faucet", { module: "init" });

describe("initializeFaucet", () => {
  it("derives the account, fetches the chain id and wires the engine", async () => {
    const ledger = new FakeLedger();
    ledger.chainId = 11155111;

    const faucet = await initializeFaucet(config, { ledger, logger: logger() });

    expect(faucet.service.address).toBe(privateKeyToAccount(`0x${TEST_PRIVATE_KEY}`).address);
    expect(faucet.service.chainId).toBe(11155111);
    expect(faucet.service.amount).toBe(1000n);
    expect(ledger.calls).toEqual(["getChainId", "getBalance"]);
  });

  it("logs the address and balance, never the key", async () => {
    const ledger = new FakeLedger();
    ledger.balance = 2_000_000_000_000_000_000n;

    await initializeFaucet(config, { ledger, logger: logger() });

    const balanceLine = logLines().find((l) => l.msg === "Faucet balance");
    expect(balanceLine?.balance).toBe("2 ETH");
    expect(chunks.some((c) => c.includes(TEST_PRIVATE_KEY))).toBe(false);
  });

  it("keeps going when the balance cannot be read", async () => {
    const ledger = new FakeLedger();
    ledger.failures.set("getBalance", new Error("method not supported"));

    const faucet = await initializeFaucet(config, { ledger, logger: logger() });

    expect(faucet.service.chainId).toBe(31337);
    const warning = logLines().find((l) => l.msg === "Failed to get balance, continuing without it");
    expect(warning?.error).toBe("failed to get balance: method not supported");
  });

  it("fails with ConfigurationError when the chain id cannot be fetched", async () => {
    const ledger = new FakeLedger();
    ledger.failures.set("getChainId", new Error("connect ECONNREFUSED 127.0.0.1:8545"));

    await expect(initializeFaucet(config, { ledger, logger: logger() })).rejects.toThrowError(
      new ConfigurationError("failed to get chain ID: connect ECONNREFUSED 127.0.0.1:8545"),
    );
  });

  it("fails with ConfigurationError when the node never answers", async () => {
    const ledger = new FakeLedger();
    ledger.hanging.add("getChainId");

    await expect(initializeFaucet(config, { ledger, logger: logger() })).rejects.toThrowError(
      new ConfigurationError("failed to get chain ID: chain_id timed out after 50ms"),
    );
  });

  it("fails before touching the node when the key is malformed", async () => {
    const ledger = new FakeLedger();

    await expect(
      initializeFaucet({ ...config, privateKey: "0xdeadbeef" }, { ledger, logger: logger() }),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(ledger.calls).toEqual([]);
  });

  it("uses the injected clock for cooldowns and serves over HTTP", async () => {
    const ledger = new FakeLedger();
    const clock = new TestClock(0);
    const { app } = await initializeFaucet(config, { ledger, now: clock.now, logger: logger() });
    const request = () =>
      app.request("/v1/faucet/request", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ address: "0x90F79bf6EB2c4f870365E785982E1f101E93b906" }),
      });

    expect((await request()).status).toBe(200);
    expect((await request()).status).toBe(429);
    clock.advance(60 * 60 * 1000);
    expect((await request()).status).toBe(200);
  });
});
