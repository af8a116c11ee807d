import { afterEach, describe, expect, test, vi } from "vitest";
import { createCustomerClient } from "../src/clients/customer";

const client = createCustomerClient({ baseUrl: "http://customers.test", timeoutMs: 1000 });

function stubFetch(response: () => Promise<Response>) {
  const fetchMock = vi.fn((_url: string | URL | Request, _init?: RequestInit) => response());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("getCustomer", () => {
  test("reads the balances and forwards the trace id", async () => {
    const fetchMock = stubFetch(async () =>
      Response.json({ id: 7, name: "Test Buyer", account_balance: 82000.5, available_credit: 15000 })
    );

    expect(await client.getCustomer(7, "trace-7")).toEqual({ id: 7, accountBalance: 82000.5, availableCredit: 15000 });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://customers.test/customers/7");
    expect(init?.headers).toEqual({ accept: "application/json", "x-trace-id": "trace-7" });
  });

  test("accepts balances serialized as decimal strings", async () => {
    stubFetch(async () => Response.json({ id: 7, account_balance: "1200.75", available_credit: "0.00" }));

    expect(await client.getCustomer(7)).toEqual({ id: 7, accountBalance: 1200.75, availableCredit: 0 });
  });

  test("returns null for an unknown customer", async () => {
    stubFetch(async () => new Response(null, { status: 404 }));

    expect(await client.getCustomer(9)).toBeNull();
  });

  test("fails on any other error status", async () => {
    stubFetch(async () => new Response("unavailable", { status: 503 }));

    await expect(client.getCustomer(7)).rejects.toThrow("GET /customers/7 returned 503");
  });
});
