import { InMemoryFileSystem } from "../../src/abstractions/InMemoryFileSystem";
import { EntryExtractor } from "../../src/extraction/EntryExtractor";
import { MarkdownEntryParser } from "../../src/extraction/MarkdownEntryParser";
import { InMemoryLogger } from "../../src/logging";

describe("EntryExtractor", () => {
  let fs: InMemoryFileSystem;
  let logger: InMemoryLogger;
  let extractor: EntryExtractor;

  beforeEach(() => {
    fs = new InMemoryFileSystem();
    logger = new InMemoryLogger();
    extractor = new EntryExtractor(fs, new MarkdownEntryParser(), logger);
  });

  it("extracts records from a source document", async () => {
    await fs.writeFile(
      "/papers/README.md",
      "[A](https://arxiv.org/abs/2401.00001)\n---\nnothing\n---\n[B](https://arxiv.org/abs/2401.00002)"
    );

    const records = await extractor.extractFromFile("/papers/README.md");

    expect(records.map((r) => r.identifier)).toEqual(["2401.00001", "2401.00002"]);
    expect(logger.getEntries()).toEqual(["extract: 2 record(s) from /papers/README.md"]);
  });

  it("returns zero records for a missing document and logs it", async () => {
    const records = await extractor.extractFromFile("/papers/missing.md");

    expect(records).toEqual([]);
    expect(logger.getEntries()).toEqual(["extract: source not found, skipping — /papers/missing.md"]);
  });

  it("uses the injected parser", async () => {
    await fs.writeFile("/papers/list.md", "anything");
    const parser = {
      *parse(text: string) {
        yield { title: text, externalUrl: "https://arxiv.org/abs/x", identifier: "x", rawSnippet: "" };
      },
    };

    const records = await new EntryExtractor(fs, parser, logger).extractFromFile("/papers/list.md");

    expect(records).toEqual([{ title: "anything", externalUrl: "https://arxiv.org/abs/x", identifier: "x", rawSnippet: "" }]);
  });
});
