import jwt from "jsonwebtoken";
import { createTokenService } from "./token.service";
import { AuthenticationError } from "../../utils/errors";
import { FakeClock } from "../../test/fakes";

const build = (clock: FakeClock, secret = "test-secret") =>
  createTokenService({ secret, accessTtlSeconds: 300, refreshTtlSeconds: 3600, now: clock.now });

describe("token service", () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  it("issues distinct access and refresh tokens for the same subject", () => {
    const tokens = build(clock);
    const pair = tokens.issuePair("user-1");

    expect(pair.access).not.toBe(pair.refresh);
    expect(tokens.verify(pair.access, "access")).toMatchObject({ sub: "user-1", type: "access" });
    expect(tokens.verify(pair.refresh, "refresh")).toMatchObject({ sub: "user-1", type: "refresh" });
  });

  it("stamps iat and exp from the injected clock", () => {
    const tokens = build(clock);
    const claims = tokens.verify(tokens.issueAccess("user-1"), "access");
    const issuedAt = Math.floor(clock.now() / 1000);

    expect(claims.iat).toBe(issuedAt);
    expect(claims.exp).toBe(issuedAt + 300);
  });

  it("gives every token its own jti", () => {
    const tokens = build(clock);
    const first = tokens.verify(tokens.issueAccess("user-1"), "access");
    const second = tokens.verify(tokens.issueAccess("user-1"), "access");

    expect(first.jti).not.toBe(second.jti);
  });

  it("rejects a token of the wrong type", () => {
    const tokens = build(clock);
    const { access, refresh } = tokens.issuePair("user-1");

    expect(() => tokens.verify(refresh, "access")).toThrow("Token is not a valid access token.");
    expect(() => tokens.verify(access, "refresh")).toThrow("Token is not a valid refresh token.");
  });

  it("accepts an access token until its lifetime has passed", () => {
    const tokens = build(clock);
    const access = tokens.issueAccess("user-1");

    clock.advance(299 * 1000);
    expect(tokens.verify(access, "access").sub).toBe("user-1");

    clock.advance(1000);
    expect(() => tokens.verify(access, "access")).toThrow("Token has expired.");
  });

  it("keeps the refresh token valid after the access token expires", () => {
    const tokens = build(clock);
    const { access, refresh } = tokens.issuePair("user-1");

    clock.advance(600 * 1000);
    expect(() => tokens.verify(access, "access")).toThrow(AuthenticationError);
    expect(tokens.verify(refresh, "refresh").sub).toBe("user-1");
  });

  it("rejects tokens signed with another secret", () => {
    const foreign = build(clock, "other-secret").issueAccess("user-1");
    expect(() => build(clock).verify(foreign, "access")).toThrow("Token is invalid.");
  });

  it("rejects garbage", () => {
    expect(() => build(clock).verify("not-a-jwt", "access")).toThrow("Token is invalid.");
  });

  it("rejects a correctly signed token without the expected claims", () => {
    const iat = Math.floor(clock.now() / 1000);
    const bare = jwt.sign({ sub: "user-1", iat }, "test-secret", { algorithm: "HS256", expiresIn: 60 });

    expect(() => build(clock).verify(bare, "access")).toThrow("Token is not a valid access token.");
  });
});
