import {
  composeIndexedText,
  createRetrievalContext,
  normalizeDocument,
  RetrievalContext,
} from "@src/retrieval";

describe("normalizeDocument", () => {
  it("prefers text, then body, content, description, summary", () => {
    expect(normalizeDocument({ summary: "s", content: "c" })).toEqual({
      body: "c",
    });
    expect(normalizeDocument({ text: "  ", body: "b", summary: "s" })).toEqual(
      { body: "b" }
    );
    expect(normalizeDocument({ description: "d", summary: "s" })).toEqual({
      body: "d",
    });
  });

  it("falls back to the title when every body field is empty", () => {
    expect(normalizeDocument({ title: "Fed holds rates", text: "" })).toEqual({
      title: "Fed holds rates",
      body: "Fed holds rates",
    });
  });

  it("accepts headline as a title and trims values", () => {
    const doc = normalizeDocument({ headline: " TSMC ", text: " record revenue " });
    expect(doc).toEqual({ title: "TSMC", body: "record revenue" });
  });

  it("rejects non-records and records without text", () => {
    expect(normalizeDocument(null)).toBeUndefined();
    expect(normalizeDocument("plain string")).toBeUndefined();
    expect(normalizeDocument(["text"])).toBeUndefined();
    expect(normalizeDocument({ text: 42, title: "" })).toBeUndefined();
  });

  it("composes title and body", () => {
    expect(composeIndexedText({ title: "Samsung", body: "earnings up" })).toBe(
      "Samsung. earnings up"
    );
    expect(composeIndexedText({ body: "earnings up" })).toBe("earnings up");
  });
});

describe("RetrievalContext.index", () => {
  it("starts empty and stays empty for an empty batch", () => {
    const ctx = new RetrievalContext();
    expect(ctx.size).toBe(0);
    ctx.index([]);
    expect(ctx.corpus).toEqual([]);
  });

  it("drops documents whose text is empty", () => {
    const ctx = createRetrievalContext([{ text: "", title: "" }]);
    expect(ctx.size).toBe(0);
  });

  it("honors the content field and prefixes the title", () => {
    const ctx = createRetrievalContext([
      { content: "Samsung earnings up", title: "Samsung" },
    ]);
    expect(ctx.corpus).toEqual(["Samsung. Samsung earnings up"]);
  });

  it("keeps insertion order and duplicates", () => {
    const ctx = createRetrievalContext([
      { text: "b" },
      { text: "a" },
      { text: "b" },
    ]);
    expect(ctx.corpus).toEqual(["b", "a", "b"]);
  });

  it("replaces rather than appends", () => {
    const docs = [{ text: "one" }, { text: "two" }];
    const ctx = new RetrievalContext();
    ctx.index(docs);
    ctx.index(docs);
    expect(ctx.size).toBe(2);

    ctx.index([{ text: "three" }]);
    expect(ctx.corpus).toEqual(["three"]);
  });

  it("clears the corpus when the batch cannot be iterated to the end", () => {
    const ctx = createRetrievalContext([{ text: "old" }]);
    function* broken(): Generator<unknown> {
      yield { text: "new" };
      throw new Error("source exploded");
    }
    expect(() => ctx.index(broken())).not.toThrow();
    expect(ctx.corpus).toEqual([]);
  });

  it("exposes a frozen snapshot", () => {
    const ctx = createRetrievalContext([{ text: "one" }]);
    expect(Object.isFrozen(ctx.corpus)).toBe(true);
  });
});
