import { describe, expect, test } from "vitest";
import { StreamError, ValidationError } from "../../src/errors";
import { processBuffer, readLines, splitLines } from "../../src/io/stream-utils";

const encoder = new TextEncoder();

function byteStream(chunks: readonly Uint8Array[], onCancel?: () => void): ReadableStream<Uint8Array> {
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[index++];
      if (chunk === undefined) {
        controller.close();
      } else {
        controller.enqueue(chunk);
      }
    },
    cancel() {
      onCancel?.();
    },
  });
}

async function lines(stream: ReadableStream<Uint8Array>, maxLineLength?: number): Promise<string[]> {
  const result: string[] = [];
  for await (const line of readLines(stream, maxLineLength !== undefined ? { maxLineLength } : {})) {
    result.push(line);
  }
  return result;
}

describe("processBuffer", () => {
  test("splits complete lines and keeps the remainder", () => {
    expect(processBuffer("a\r\nb\nc")).toEqual({ lines: ["a", "b"], remainder: "c" });
  });

  test("keeps empty lines", () => {
    expect(processBuffer("a\n\nb\n")).toEqual({ lines: ["a", "", "b"], remainder: "" });
  });

  test("rejects lines above the limit", () => {
    expect(() => processBuffer("abcdef\n", 3)).toThrow("Line too long: 6 characters exceeds maximum 3");
    expect(() => processBuffer("abcdef", 3)).toThrow(StreamError);
  });
});

test("splitLines yields an unterminated final line", () => {
  expect([...splitLines("x\r\ny\r")]).toEqual(["x", "y"]);
});

describe("readLines", () => {
  test("joins lines across chunk boundaries", async () => {
    const stream = byteStream([encoder.encode("##fileformat=VCF"), encoder.encode("v4.2\n#CHR"), encoder.encode("OM\n")]);
    expect(await lines(stream)).toEqual(["##fileformat=VCFv4.2", "#CHROM"]);
  });

  test("decodes a multi-byte character split between chunks", async () => {
    const bytes = encoder.encode("Sample-é\n");
    const cut = bytes.length - 2;
    expect(await lines(byteStream([bytes.subarray(0, cut), bytes.subarray(cut)]))).toEqual(["Sample-é"]);
  });

  test("yields a last line without a newline", async () => {
    expect(await lines(byteStream([encoder.encode("a\nb")]))).toEqual(["a", "b"]);
  });

  test("cancels the stream when the consumer stops early", async () => {
    let cancelled = false;
    const stream = byteStream([encoder.encode("a\nb\n"), encoder.encode("c\n")], () => {
      cancelled = true;
    });

    for await (const line of readLines(stream)) {
      if (line === "a") break;
    }
    expect(cancelled).toBe(true);
  });

  test("wraps stream failures in StreamError", async () => {
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error("disk gone"));
      },
    });
    await expect(lines(stream)).rejects.toThrow("Line reading failed: disk gone");
  });

  test("passes library errors through unchanged", async () => {
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new ValidationError("bad input"));
      },
    });
    await expect(lines(stream)).rejects.toThrow(ValidationError);
  });

  test("enforces maxLineLength", async () => {
    await expect(lines(byteStream([encoder.encode("abcdefgh\n")]), 4)).rejects.toThrow(StreamError);
  });
});
