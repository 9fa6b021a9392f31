import { SearchExecutor, isValidLimit } from "./search-executor.js";
import { InvalidInputError } from "../errors.js";
import { StubSearchClient } from "../search/client.js";
import { makeRawMatch } from "../testing/fixtures.js";

describe("isValidLimit", () => {
  it("accepts positive integers only", () => {
    expect(isValidLimit(1)).toBe(true);
    expect(isValidLimit(0)).toBe(false);
    expect(isValidLimit(-3)).toBe(false);
    expect(isValidLimit(2.5)).toBe(false);
    expect(isValidLimit("5")).toBe(false);
  });
});

describe("SearchExecutor", () => {
  it("returns at most limit records in index order", async () => {
    const client = new StubSearchClient([
      makeRawMatch({ ip_str: "192.0.2.1" }),
      makeRawMatch({ ip_str: "192.0.2.2" }),
      makeRawMatch({ ip_str: "192.0.2.3" }),
    ]);
    const executor = new SearchExecutor(client);

    const records = await executor.execute("apache", 2);

    expect(records.map((r) => r.address)).toEqual(["192.0.2.1", "192.0.2.2"]);
    expect(client.calls).toEqual([{ query: "apache", limit: 2 }]);
  });

  it("returns an empty list when nothing matches", async () => {
    const executor = new SearchExecutor(new StubSearchClient([]));
    expect(await executor.execute("nothing", 5)).toEqual([]);
  });

  it("defaults to five results", async () => {
    const client = new StubSearchClient([]);
    await new SearchExecutor(client).execute("apache");
    expect(client.calls[0].limit).toBe(5);
  });

  it("rejects a non-positive limit before searching", async () => {
    const client = new StubSearchClient([]);
    const executor = new SearchExecutor(client);

    await expect(executor.execute("apache", 0)).rejects.toThrow(
      new InvalidInputError("Result limit must be a positive integer, got 0"),
    );
    expect(client.calls).toHaveLength(0);
  });
});
