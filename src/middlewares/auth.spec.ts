import { apiKeyClientId, matchesApiKey, ownerKey } from "./auth";

describe("matchesApiKey", () => {
  it("returns the client id of the matching key", () => {
    expect(matchesApiKey("key-b", ["key-a", "key-b"])).toBe(apiKeyClientId("key-b"));
  });

  it("gives every key its own client id", () => {
    expect(apiKeyClientId("key-a")).not.toBe(apiKeyClientId("key-b"));
    expect(apiKeyClientId("key-a")).toMatch(/^key-[0-9a-f]{12}$/);
  });

  it("rejects near misses and prefixes", () => {
    expect(matchesApiKey("key-", ["key-a"])).toBeNull();
    expect(matchesApiKey("key-a ", ["key-a"])).toBeNull();
  });

  it("rejects everything when no keys are configured", () => {
    expect(matchesApiKey("anything", [])).toBeNull();
  });
});

describe("ownerKey", () => {
  it("separates users from API-key clients", () => {
    expect(ownerKey({ kind: "user", userId: "42", email: "ana@example.com" })).toBe("user:42");
    expect(ownerKey({ kind: "api-key", clientId: "key-0123456789ab" })).toBe("api-key:key-0123456789ab");
  });
});
