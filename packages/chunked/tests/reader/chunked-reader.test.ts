import { type ByteSource, readAll } from "@splitwire/utils";
import { describe, expect, it, vi } from "vitest";
import {
  type ChunkDecoder,
  ChunkedReader,
  type ChunkedReaderInit,
  chunkType,
  createParser,
  type DecodeContext,
  IllegalStateError,
  InvalidArgumentError,
  LengthPrefixedParser,
  MediaType,
  textDecoder,
} from "../../src/index.js";
import { blockSource, failingSource, textSource } from "../helpers.js";

/** Wraps a source and counts reads and closes. */
function trackedSource(inner: ByteSource) {
  const stats = { reads: 0, closes: 0 };
  const source: ByteSource = {
    read: () => {
      stats.reads++;
      return inner.read();
    },
    close: async () => {
      stats.closes++;
      await inner.close();
    },
  };
  return { source, stats };
}

function textReader(
  text: string,
  init: Partial<ChunkedReaderInit<string>> = {},
): ChunkedReader<string> {
  return new ChunkedReader({
    type: chunkType("string"),
    source: textSource(text),
    decoder: textDecoder,
    ...init,
  });
}

describe("ChunkedReader", () => {
  describe("read", () => {
    it("decodes CRLF-delimited chunks by default", async () => {
      const reader = textReader("abc\r\ndef\r\n");
      expect(await reader.read()).toBe("abc");
      expect(await reader.read()).toBe("def");
      expect(reader.isClosed()).toBe(false);
      expect(await reader.read()).toBeNull();
      expect(reader.isClosed()).toBe(true);
      expect(reader.getCloseReason()).toEqual({ type: "end-of-stream" });
    });

    it("closes immediately on an empty stream", async () => {
      const { source, stats } = trackedSource(textSource(""));
      const reader = textReader("", { source });
      expect(await reader.read()).toBeNull();
      expect(reader.isClosed()).toBe(true);
      expect(stats.closes).toBe(1);
    });

    it("passes the chunk and its context to the decoder", async () => {
      const contexts: DecodeContext[] = [];
      const decoder: ChunkDecoder<string> = {
        async decode(chunk, context) {
          contexts.push(context);
          return new TextDecoder().decode(await readAll(chunk));
        },
      };
      const properties = new Map<string, unknown>([["request-id", "req-1"]]);
      const reader = new ChunkedReader({
        type: chunkType("Map<string, number>"),
        source: textSource("{}|"),
        decoder,
        annotations: ["streaming"],
        headers: { "Content-Type": ["application/json"] },
        properties,
        parser: createParser("|"),
      });

      expect(await reader.read()).toBe("{}");
      expect(contexts).toHaveLength(1);
      const [context] = contexts;
      expect(context.type).toEqual({ name: "Map<string, number>", rawType: "Map" });
      expect(context.rawType).toBe("Map");
      expect(context.annotations).toEqual(["streaming"]);
      expect(context.mediaType.toString()).toBe("application/json");
      expect(context.headers).toEqual({ "Content-Type": ["application/json"] });
      expect(context.properties.get("request-id")).toBe("req-1");
      expect(context.entityStream).toBe(false);
    });

    it("keeps reading after a decode failure", async () => {
      const decoder: ChunkDecoder<number> = {
        async decode(chunk) {
          const text = new TextDecoder().decode(await readAll(chunk));
          const value = Number(text);
          if (Number.isNaN(value)) throw new SyntaxError(`not a number: ${text}`);
          return value;
        },
      };
      const reader = new ChunkedReader({
        type: chunkType("number"),
        source: textSource("1\nx\n3\n"),
        decoder,
        parser: createParser("\n"),
      });

      expect(await reader.read()).toBe(1);
      await expect(reader.read()).rejects.toThrow("not a number: x");
      expect(reader.isClosed()).toBe(false);
      expect(await reader.read()).toBe(3);
      expect(await reader.read()).toBeNull();
    });

    it("closes and returns null when the source fails", async () => {
      const failure = new Error("connection reset");
      const debug = vi.fn();
      const reader = textReader("", {
        source: failingSource("a\r\nb", failure),
        logger: { debug },
      });

      expect(await reader.read()).toBe("a");
      expect(await reader.read()).toBeNull();
      expect(reader.isClosed()).toBe(true);
      expect(reader.getCloseReason()).toEqual({ type: "error", error: failure });
      expect(debug).toHaveBeenCalledWith("Failed to read chunk:", failure);
    });

    it("treats parser framing errors as read failures", async () => {
      const reader = textReader("0005hi", { parser: new LengthPrefixedParser() });
      expect(await reader.read()).toBeNull();
      expect(reader.getCloseReason()?.type).toBe("error");
    });

    it("discards a chunk cut short by a concurrent close", async () => {
      const bytes = new TextEncoder().encode("abc");
      let pos = 0;
      let waiting = false;
      let finish: (value: number) => void = () => {};
      const source: ByteSource = {
        read: () => {
          if (pos < bytes.length) return Promise.resolve(bytes[pos++]);
          return new Promise<number>((resolve) => {
            waiting = true;
            finish = resolve;
          });
        },
        close: async () => {
          finish(-1);
        },
      };
      const decode = vi.fn(async () => "decoded");
      const reader = new ChunkedReader({
        type: chunkType("string"),
        source,
        decoder: { decode },
        parser: createParser("|"),
      });

      const pending = reader.read();
      await vi.waitFor(() => expect(waiting).toBe(true));
      await reader.close();
      expect(await pending).toBeNull();
      expect(decode).not.toHaveBeenCalled();
      expect(reader.getCloseReason()).toEqual({ type: "closed" });
    });

    it("fails after close without touching the source", async () => {
      const { source, stats } = trackedSource(textSource("a\r\n"));
      const reader = textReader("", { source });
      await reader.close();
      await expect(reader.read()).rejects.toThrow(IllegalStateError);
      await expect(reader.read()).rejects.toThrow("Chunked input has been closed");
      expect(stats.reads).toBe(0);
    });

    it("fails after reaching the end of the stream", async () => {
      const reader = textReader("a");
      expect(await reader.read()).toBe("a");
      expect(await reader.read()).toBeNull();
      await expect(reader.read()).rejects.toThrow(IllegalStateError);
    });
  });

  describe("close", () => {
    it("releases the source exactly once", async () => {
      const { source, stats } = trackedSource(textSource("a\r\n"));
      const reader = textReader("", { source });
      await reader.close();
      await reader.close();
      await reader.close();
      expect(reader.isClosed()).toBe(true);
      expect(stats.closes).toBe(1);
      expect(reader.getCloseReason()).toEqual({ type: "closed" });
    });

    it("releases once under concurrent callers", async () => {
      let release: () => void = () => {};
      const closes = vi.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          }),
      );
      const source: ByteSource = { read: async () => -1, close: closes };
      const reader = textReader("", { source });

      const pending = [reader.close(), reader.close(), reader.close()];
      expect(reader.isClosed()).toBe(true);
      release();
      await Promise.all(pending);
      expect(closes).toHaveBeenCalledTimes(1);
    });

    it("logs and swallows source close failures", async () => {
      const failure = new Error("already gone");
      const debug = vi.fn();
      const source: ByteSource = {
        read: async () => -1,
        close: async () => {
          throw failure;
        },
      };
      const reader = textReader("", { source, logger: { debug } });
      await expect(reader.close()).resolves.toBeUndefined();
      expect(debug).toHaveBeenCalledWith("Failed to close chunk source:", failure);
    });

    it("is open until closed", () => {
      expect(textReader("a").isClosed()).toBe(false);
      expect(textReader("a").getCloseReason()).toBeNull();
    });
  });

  describe("chunk type", () => {
    it("defaults to the Content-Type header", () => {
      const reader = textReader("", { headers: { "content-type": ["text/plain; charset=utf-8"] } });
      expect(reader.getChunkType().toString()).toBe("text/plain; charset=utf-8");
    });

    it("ignores a malformed Content-Type header", () => {
      const debug = vi.fn();
      const reader = textReader("", {
        headers: { "content-type": ["not a media type"] },
        logger: { debug },
      });
      expect(reader.getChunkType()).toBe(MediaType.APPLICATION_OCTET_STREAM);
      expect(debug).toHaveBeenCalledTimes(1);
      expect(debug.mock.calls[0][0]).toBe('Ignoring malformed Content-Type "not a media type":');
    });

    it("prefers an explicit media type", () => {
      const reader = textReader("", {
        mediaType: MediaType.APPLICATION_JSON,
        headers: { "content-type": ["text/plain"] },
      });
      expect(reader.getChunkType()).toBe(MediaType.APPLICATION_JSON);
    });

    it("falls back to application/octet-stream", () => {
      expect(textReader("").getChunkType()).toBe(MediaType.APPLICATION_OCTET_STREAM);
    });

    it("uses an overridden media type for later chunks", async () => {
      const reader = textReader("café|café|", { parser: createParser("|") });
      expect(await reader.read()).toBe("café");
      reader.setChunkType("text/plain; charset=latin1");
      expect(reader.getChunkType().charset).toBe("latin1");
      expect(await reader.read()).toBe("cafÃ©");
    });

    it.each([null, undefined, "not a media type"])("rejects %j", (value) => {
      const reader = textReader("", { mediaType: "text/plain" });
      expect(() => reader.setChunkType(value)).toThrow(InvalidArgumentError);
      expect(reader.getChunkType().toString()).toBe("text/plain");
    });
  });

  describe("parser", () => {
    it("switches the boundary between reads", async () => {
      const reader = textReader("a\r\nb|c|");
      const crlf = reader.getParser();
      expect(await reader.read()).toBe("a");
      reader.setParser(createParser("|"));
      expect(reader.getParser()).not.toBe(crlf);
      expect(await reader.read()).toBe("b");
      expect(await reader.read()).toBe("c");
    });

    it("rejects a missing parser", () => {
      const reader = textReader("");
      const parser = reader.getParser();
      expect(() => reader.setParser(null)).toThrow(InvalidArgumentError);
      expect(reader.getParser()).toBe(parser);
    });
  });

  describe("async iteration", () => {
    it("yields every chunk", async () => {
      const values: string[] = [];
      for await (const value of textReader("x\r\ny\r\nz")) {
        values.push(value);
      }
      expect(values).toEqual(["x", "y", "z"]);
    });

    it("closes the reader when the loop exits early", async () => {
      const { source, stats } = trackedSource(textSource("x\r\ny\r\n"));
      const reader = textReader("", { source });
      for await (const value of reader) {
        expect(value).toBe("x");
        break;
      }
      expect(reader.isClosed()).toBe(true);
      expect(stats.closes).toBe(1);
      expect(reader.getCloseReason()).toEqual({ type: "closed" });
    });
  });

  it("reads large chunks from block streams", async () => {
    const payload = "p".repeat(10_000);
    const reader = textReader("", { source: blockSource(`${payload}\r\n${payload}`, 512) });
    expect(await reader.read()).toBe(payload);
    expect(await reader.read()).toBe(payload);
    expect(await reader.read()).toBeNull();
  });
});
