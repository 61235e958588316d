/**
 * Unit Tests: Search Intent Extraction
 *
 * The LLM client is mocked; these tests cover prompt assembly, response
 * coercion and every fallback path.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../llm/client", () => ({
  generateText: vi.fn(),
  isProviderConfigured: vi.fn(),
}));

import { generateText, isProviderConfigured } from "../llm/client";
import {
  coerceLimit,
  extractSearchIntent,
  fallbackIntent,
  parseIntentResponse,
  stripCodeFences,
} from "../search/intentExtractor";
import { ProviderTimeoutError } from "../utils/errorHandler";
import { day } from "./helpers";

const mockGenerateText = vi.mocked(generateText);
const mockIsProviderConfigured = vi.mocked(isProviderConfigured);

function modelReplies(text: string) {
  mockGenerateText.mockResolvedValue({ text, provider: "gemini", model: "gemini-2.5-flash" });
}

describe("extractSearchIntent", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv("INTENT_MODEL", "");
    mockIsProviderConfigured.mockReturnValue(true);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("coerces a fenced JSON reply into a SearchIntent", async () => {
    modelReplies([
      "```json",
      JSON.stringify({
        keywords: "Faith",
        synonyms: "Trust, Belief",
        speaker: "Seun",
        start_date: "2024-01-01",
        end_date: "2024-12-31",
        limit: "5",
        sort: "newest",
      }),
      "```",
    ].join("\n"));

    const result = await extractSearchIntent("faith messages by Pastor Seun in 2024");

    expect(result).toEqual({
      source: "llm",
      model: "gemini-2.5-flash",
      promptVersion: "2026-10-12-003",
      intent: {
        keywords: "Faith",
        synonyms: "Trust, Belief",
        speaker: "Seun",
        startDate: day(2024, 1, 1),
        endDate: day(2024, 12, 31),
        limit: 5,
        sort: "newest",
      },
    });
  });

  it("sends today's date and the raw query to the intent model", async () => {
    modelReplies("{}");

    await extractSearchIntent("latest from Seun", day(2026, 3, 5));

    expect(mockGenerateText).toHaveBeenCalledTimes(1);
    const request = mockGenerateText.mock.calls[0][0];
    expect(request).toMatchObject({
      model: "gemini-2.5-flash",
      temperature: 0,
      maxTokens: 1000,
      timeoutMs: 15000,
    });
    expect(request.messages[0].role).toBe("system");
    expect(request.messages[0].content).toContain("Today is 2026-03-05.");
    expect(request.messages[1]).toEqual({ role: "user", content: 'User Query: "latest from Seun"' });
  });

  it("honors the INTENT_MODEL override", async () => {
    vi.stubEnv("INTENT_MODEL", "gpt-4o-mini");
    modelReplies("{}");

    await extractSearchIntent("grace");

    expect(mockIsProviderConfigured).toHaveBeenCalledWith("gpt-4o-mini");
    expect(mockGenerateText.mock.calls[0][0].model).toBe("gpt-4o-mini");
  });

  it("fills defaults for an empty object", async () => {
    modelReplies("{}");

    const result = await extractSearchIntent("anything");

    expect(result.source).toBe("llm");
    expect(result.intent).toEqual({
      keywords: null,
      synonyms: "",
      speaker: null,
      startDate: null,
      endDate: null,
      limit: 10,
      sort: "relevance",
    });
  });

  it("falls back without calling the model when no credential is set", async () => {
    mockIsProviderConfigured.mockReturnValue(false);

    const result = await extractSearchIntent("  grace messages ");

    expect(mockGenerateText).not.toHaveBeenCalled();
    expect(result).toEqual({
      source: "fallback",
      reason: "no_credentials",
      intent: fallbackIntent("grace messages"),
    });
    expect(result.intent.keywords).toBe("grace messages");
  });

  it("falls back when the model is not registered", async () => {
    mockIsProviderConfigured.mockImplementation(() => {
      throw new Error("[LLM Client] Unknown model");
    });

    const result = await extractSearchIntent("grace");

    expect(result).toMatchObject({ source: "fallback", reason: "provider_error" });
  });

  it("falls back on a malformed reply", async () => {
    modelReplies("Sure! Here are your filters: keywords=faith");

    const result = await extractSearchIntent("faith");

    expect(result).toMatchObject({ source: "fallback", reason: "malformed_response" });
    expect(result.intent.keywords).toBe("faith");
  });

  it("falls back when the reply is JSON but not an object", async () => {
    modelReplies("[\"faith\"]");

    const result = await extractSearchIntent("faith");

    expect(result).toMatchObject({ source: "fallback", reason: "malformed_response" });
  });

  it("falls back on a provider error", async () => {
    mockGenerateText.mockRejectedValue(new Error("503 Service Unavailable"));

    const result = await extractSearchIntent("hope");

    expect(result).toMatchObject({ source: "fallback", reason: "provider_error" });
    expect(result.intent).toEqual(fallbackIntent("hope"));
  });

  it("falls back on a timeout", async () => {
    mockGenerateText.mockRejectedValue(new ProviderTimeoutError("gemini", 15000));

    const result = await extractSearchIntent("hope");

    expect(result).toMatchObject({ source: "fallback", reason: "timeout" });
  });
});

describe("parseIntentResponse", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("treats 'none' and 'null' strings as absent", () => {
    const intent = parseIntentResponse(JSON.stringify({ keywords: "None", speaker: "null", synonyms: " none " }));

    expect(intent).toMatchObject({ keywords: null, speaker: null, synonyms: "" });
  });

  it("accepts preacher and camelCase date keys", () => {
    const intent = parseIntentResponse(JSON.stringify({
      keywords: "prayer",
      preacher: "Damilola",
      startDate: "2023-06-01",
      endDate: "2023-06-30",
    }));

    expect(intent).toMatchObject({
      speaker: "Damilola",
      startDate: day(2023, 6, 1),
      endDate: day(2023, 6, 30),
    });
  });

  it("drops unparsable dates and mistyped fields", () => {
    const intent = parseIntentResponse(JSON.stringify({
      keywords: 42,
      speaker: ["Seun"],
      start_date: "last Sunday",
      sort: "oldest",
    }));

    expect(intent).toEqual({
      keywords: null,
      synonyms: "",
      speaker: null,
      startDate: null,
      endDate: null,
      limit: 10,
      sort: "relevance",
    });
    expect(console.warn).toHaveBeenCalledWith("[IntentExtractor] Ignoring unparsable start_date: \"last Sunday\"");
  });

  it("returns null for non-object JSON", () => {
    expect(parseIntentResponse("null")).toBeNull();
    expect(parseIntentResponse("\"faith\"")).toBeNull();
  });
});

describe("coerceLimit", () => {
  it.each([
    [3, 3],
    ["7", 7],
    [" 12 ", 12],
    [2.9, 2],
    [0, 10],
    [-4, 10],
    ["abc", 10],
    ["", 10],
    [null, 10],
    [undefined, 10],
    [Number.POSITIVE_INFINITY, 10],
  ])("coerces %j to %i", (input, expected) => {
    expect(coerceLimit(input)).toBe(expected);
  });
});

describe("stripCodeFences", () => {
  it("removes json fences", () => {
    expect(stripCodeFences("```json\n{\"a\":1}\n```")).toBe("{\"a\":1}");
  });

  it("removes bare fences", () => {
    expect(stripCodeFences("```\n{}\n```")).toBe("{}");
  });

  it("leaves unfenced text alone", () => {
    expect(stripCodeFences("  {\"a\":1}  ")).toBe("{\"a\":1}");
  });
});
