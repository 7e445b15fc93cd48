import { describe, it, expect } from "vitest";
import OpenAI from "openai";
import { AuthError, TransportError } from "../src/agent/errors.js";
import { DEFAULT_MODEL } from "../src/config.js";
import { OpenRouterClient, toClientError } from "../src/llm/client.js";

describe("OpenRouterClient", () => {
  it("requires an API key before any request", () => {
    expect(() => new OpenRouterClient({ apiKey: undefined })).toThrow(AuthError);
    expect(() => new OpenRouterClient({ apiKey: "" })).toThrow(
      "OpenRouter API key not found. Set the OPENROUTER_API_KEY environment variable.",
    );
  });

  it("uses the default model unless told otherwise", () => {
    expect(new OpenRouterClient({ apiKey: "test-secret" }).model).toBe(DEFAULT_MODEL);
    expect(new OpenRouterClient({ apiKey: "test-secret", model: "some/model" }).model).toBe(
      "some/model",
    );
  });
});

describe("toClientError", () => {
  it("maps rejected credentials to AuthError", () => {
    const error = toClientError(new OpenAI.AuthenticationError(401, undefined, "bad key", undefined));
    expect(error).toBeInstanceOf(AuthError);
    expect(error.message).toBe("OpenRouter rejected the API key (401)");

    const denied = toClientError(new OpenAI.PermissionDeniedError(403, undefined, "nope", undefined));
    expect(denied).toBeInstanceOf(AuthError);
  });

  it("maps connection failures to TransportError", () => {
    const error = toClientError(new OpenAI.APIConnectionError({ message: "socket hang up" }));
    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe("Could not reach OpenRouter: socket hang up");
  });

  it("keeps the status of other API errors", () => {
    const error = toClientError(new OpenAI.InternalServerError(500, undefined, "oops", undefined));
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 500, message: "OpenRouter API error: 500 oops" });
  });

  it("wraps anything else", () => {
    const error = toClientError(new Error("weird"));
    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe("OpenRouter request failed: weird");
  });
});
