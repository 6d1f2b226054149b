import { Readable, type Writable } from "node:stream";
import type { BlobData } from "@locus-sdk/types";

/** Reads a byte stream to the end. */
export async function readBytes(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export async function readText(stream: Readable, encoding: BufferEncoding = "utf8"): Promise<string> {
  return (await readBytes(stream)).toString(encoding);
}

/** Encodes `text` onto a byte stream, resolving once the chunk is flushed. */
export function writeText(
  stream: Writable,
  text: string,
  encoding: BufferEncoding = "utf8",
): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(Buffer.from(text, encoding), (error) => (error ? reject(error) : resolve()));
  });
}

export function toReadable(data: BlobData): Readable {
  if (data instanceof Readable) return data;
  const bytes = typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data);
  return Readable.from([bytes], { objectMode: false });
}

export async function toBuffer(data: BlobData): Promise<Buffer> {
  if (data instanceof Readable) return readBytes(data);
  return typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data);
}
