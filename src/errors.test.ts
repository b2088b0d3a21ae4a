import { describe, expect, it } from "vitest";
import {
  ConfigError,
  DialError,
  ForwardError,
  ListenError,
  ProxyError,
  errorMessage,
  toProxyError,
} from "./errors.js";

describe("ProxyError hierarchy", () => {
  it("ProxyError is an Error with code", () => {
    const err = new ProxyError("test", "TEST_ERROR");
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("ProxyError");
    expect(err.code).toBe("TEST_ERROR");
    expect(err.message).toBe("test");
  });

  it("domain errors have correct codes and extend ProxyError", () => {
    const dial = new DialError("ws://backend:9000", "connection refused");
    expect(dial).toBeInstanceOf(ProxyError);
    expect(dial.code).toBe("DIAL");
    expect(dial.name).toBe("DialError");
    expect(dial.address).toBe("ws://backend:9000");

    const forward = new ForwardError("socket closed");
    expect(forward).toBeInstanceOf(ProxyError);
    expect(forward.code).toBe("FORWARD");
    expect(forward.name).toBe("ForwardError");

    const config = new ConfigError("bad port");
    expect(config.code).toBe("CONFIG");
    expect(config.name).toBe("ConfigError");

    const listen = new ListenError("address in use");
    expect(listen).toBeInstanceOf(ProxyError);
    expect(listen.code).toBe("LISTEN");
  });

  it("preserves cause chain", () => {
    const cause = new Error("ECONNREFUSED");
    const err = new DialError("ws://backend:9000", "dial failed", { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("toProxyError", () => {
  it("passes through ProxyError unchanged", () => {
    const err = new ProxyError("x", "X");
    expect(toProxyError(err)).toBe(err);
  });

  it("wraps plain Error with cause chain", () => {
    const plain = new Error("plain");
    const wrapped = toProxyError(plain);
    expect(wrapped).toBeInstanceOf(ProxyError);
    expect(wrapped.code).toBe("UNKNOWN");
    expect(wrapped.message).toBe("plain");
    expect(wrapped.cause).toBe(plain);
  });

  it("wraps non-Error values", () => {
    expect(toProxyError("string error").message).toBe("string error");
    expect(toProxyError(42).message).toBe("42");
    expect(toProxyError(null).message).toBe("Unknown error");
    expect(toProxyError(undefined).message).toBe("Unknown error");
  });
});

describe("errorMessage", () => {
  it("extracts message from Error instances", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(new ForwardError("typed"))).toBe("typed");
  });

  it("stringifies non-Error values", () => {
    expect(errorMessage("string error")).toBe("string error");
    expect(errorMessage(42)).toBe("42");
    expect(errorMessage(null)).toBe("Unknown error");
    expect(errorMessage(undefined)).toBe("Unknown error");
  });
});
