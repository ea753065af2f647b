import { decodeHtmlEntities, parseFeed, sanitizeText } from "@src/news/rss";

describe("sanitizeText", () => {
  it("unwraps CDATA and drops escaped markup", () => {
    expect(sanitizeText("<![CDATA[<p>Revenue  up</p>]]>")).toBe("Revenue up");
    expect(sanitizeText("&lt;b&gt;Bold&lt;/b&gt; move")).toBe("Bold move");
  });

  it("keeps escaped comparison signs in prose", () => {
    expect(sanitizeText("P/E &lt; 10 and margin &gt; 5%")).toBe(
      "P/E < 10 and margin > 5%"
    );
  });

  it("decodes numeric entities", () => {
    expect(decodeHtmlEntities("caf&#233; &#x26; bar")).toBe("café & bar");
  });

  it("decodes entities outside the basic plane", () => {
    expect(decodeHtmlEntities("&#128200; &#x1F4C8;")).toBe("\u{1F4C8} \u{1F4C8}");
  });
});

describe("parseFeed", () => {
  it("reads RSS items", () => {
    const xml = `<?xml version="1.0"?>
<rss><channel>
  <title>Feed</title>
  <item>
    <title>TSMC beats &amp; raises</title>
    <link>https://example.com/a</link>
    <description><![CDATA[<p>Revenue up</p>]]></description>
    <pubDate>Wed, 01 May 2024 12:00:00 GMT</pubDate>
  </item>
  <item>
    <title>No date</title>
    <description>&lt;b&gt;Bold&lt;/b&gt; move</description>
  </item>
</channel></rss>`;

    expect(parseFeed(xml)).toEqual([
      {
        title: "TSMC beats & raises",
        description: "Revenue up",
        url: "https://example.com/a",
        publishedAt: "2024-05-01T12:00:00.000Z",
      },
      {
        title: "No date",
        description: "Bold move",
        url: undefined,
        publishedAt: "",
      },
    ]);
  });

  it("reads Atom entries with href links", () => {
    const xml = `<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <title>Atom one</title>
    <link rel="alternate" href="https://example.com/atom"/>
    <summary>Sum</summary>
    <updated>2024-05-02T08:00:00Z</updated>
  </entry>
</feed>`;

    expect(parseFeed(xml)).toEqual([
      {
        title: "Atom one",
        description: "Sum",
        url: "https://example.com/atom",
        publishedAt: "2024-05-02T08:00:00.000Z",
      },
    ]);
  });

  it("returns nothing for a document without items", () => {
    expect(parseFeed("<html><body>rate limited</body></html>")).toEqual([]);
  });
});
