/*
 * Licensed to the Apache Software Foundation (ASF) under one
 * or more contributor license agreements.  See the NOTICE file
 * distributed with this work for additional information
 * regarding copyright ownership.  The ASF licenses this file
 * to you under the Apache License, Version 2.0 (the
 * "License"); you may not use this file except in compliance
 * with the License.  You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { Writer, Reader } from "protobufjs";
import { Window } from "../values";

/**
 * The context for encoding an element.
 * For example, for strings of utf8 characters or bytes, `wholeStream` encoding means
 * that the string will be encoded as-is; while `needsDelimiter` encoding means that the
 * string will be encoded prefixed with its length.
 *
 * ```js
 * coder = new StrUtf8Coder()
 * w1 = new Writer()
 * coder.encode("my string", w, Context.wholeStream)
 * console.log(w1.finish())  // <= Prints the pure byte-encoding of the string
 * w2 = new Writer()
 * coder.encode("my string", w, Context.needsDelimiters)
 * console.log(w2.finish())  // <= Prints a length-prefix string of bytes
 * ```
 */
export enum Context {
  /**
   * Whole stream encoding/decoding means that the encoding/decoding function does not need to worry about
   * delimiting the start and end of the current element in the stream of bytes.
   */
  wholeStream = "wholeStream",
  /**
   * Needs-delimiters encoding means that the encoding of data must be such that when decoding,
   * the coder is able to stop decoding data at the end of the current element.
   */
  needsDelimiters = "needsDelimiters",
}

/**
 * The base interface for coders, which turn keys, values, windows and state
 * into bytes for the state store and back.
 */
export interface Coder<T> {
  /**
   * Encode an element into a stream of bytes.
   * @param element - the value to encode
   * @param writer - a writer that interfaces the coder with the output byte stream.
   * @param context - the context within which the element should be encoded.
   */
  encode(element: T, writer: Writer, context: Context): void;

  /**
   * Decode an element from an incoming stream of bytes.
   * @param reader - a reader that interfaces the coder with the input byte stream
   * @param context - the context within which the element should be encoded
   */
  decode(reader: Reader, context: Context): T;
}

function writeByteCallback(val: number, buf: Uint8Array, pos: number) {
  buf[pos] = val & 0xff;
}

/** @internal */
export interface HackedWriter extends Writer {
  _push?(...args: unknown[]): void;
}

/**
 * Write a single byte, as an unsigned integer, directly to the writer.
 */
export function writeRawByte(b: number, writer: HackedWriter) {
  writer._push?.(writeByteCallback, 1, b);
}

function writeBytesCallback(val: Uint8Array, buf: Uint8Array, pos: number) {
  for (let i = 0; i < val.length; ++i) {
    buf[pos + i] = val[i];
  }
}

/**
 * Writes a sequence of bytes, as unsigned integers, directly to the writer,
 * without a prefixing with the length of the bytes that writer.bytes() does.
 */
export function writeRawBytes(value: Uint8Array, writer: HackedWriter) {
  writer._push?.(writeBytesCallback, value.length, value);
}

export function encodeToBytes<T>(element: T, coder: Coder<T>): Uint8Array {
  const writer = new Writer();
  coder.encode(element, writer, Context.wholeStream);
  return writer.finish();
}

export function decodeFromBytes<T>(encoded: Uint8Array, coder: Coder<T>): T {
  return coder.decode(new Reader(encoded), Context.wholeStream);
}

/**
 * Stable string identifiers for keys and windows, used to address state and
 * timers.
 */
export function encodeToBase64<T>(element: T, coder: Coder<T>): string {
  return Buffer.from(encodeToBytes(element, coder)).toString("base64");
}

export function decodeFromBase64<T>(s: string, coder: Coder<T>): T {
  return decodeFromBytes(new Uint8Array(Buffer.from(s, "base64")), coder);
}

/**
 * A coder for one concrete type of window, able to tell whether an arbitrary
 * window is of that type.
 */
export interface WindowCoder<W extends Window> extends Coder<W> {
  isWindow(window: Window): window is W;
}
