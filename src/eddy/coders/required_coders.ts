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

import { Reader, Writer } from "protobufjs";
import Long from "long";

import {
  Coder,
  Context,
  WindowCoder,
  writeRawByte,
  writeRawBytes,
} from "./coders";
import {
  Window,
  GlobalWindow,
  Instant,
  KV,
  PaneInfo,
  Timing,
  WindowedValue,
} from "../values";

/**
 * @fileoverview The coders every part of the engine relies on: bytes,
 * key-value pairs, iterables, timestamps, the global window, pane metadata and
 * windowed values. Keys, window identifiers, state cells and bundles are all
 * built from these.
 */

/**
 * Coder for byte-array data types.
 */
export class BytesCoder implements Coder<Uint8Array> {
  static INSTANCE: BytesCoder = new BytesCoder();
  type: string = "bytescoder";

  /**
   * Encode the input element (a byte-string) into the output byte stream from `writer`.
   * If context is `needsDelimiters`, the byte string is encoded prefixed with a
   * varint representing its length.
   *
   * If the context is `wholeStream`, the byte string is encoded as-is.
   *
   * For example:
   * ```js
   * const w1 = new Writer()
   * const data = new TextEncoder().encode("bytes")
   * new BytesCoder().encode(data, w1, Context.needsDelimiters)
   * console.log(w1.finish())  // ==> prints Uint8Array(6) [ 5, 98, 121, 116, 101, 115 ], where 5 is the length prefix.
   * ```
   */
  encode(value: Uint8Array, writer: Writer, context: Context) {
    switch (context) {
      case Context.wholeStream:
        writeRawBytes(value, writer);
        break;
      case Context.needsDelimiters:
        writer.bytes(value);
        break;
      default:
        throw new Error("Unknown type of encoding context");
    }
  }

  /**
   * Decode the input byte stream into a byte array.
   * If context is `needsDelimiters`, the first bytes will be interpreted as a var-int32 encoding
   * the length of the data.
   *
   * If the context is `wholeStream`, the rest of the input stream is decoded as-is.
   */
  decode(reader: Reader, context: Context): Uint8Array {
    switch (context) {
      case Context.wholeStream: {
        const value = reader.buf.slice(reader.pos, reader.len);
        reader.pos = reader.len;
        return value;
      }
      case Context.needsDelimiters: {
        const length = reader.int32();
        const value = reader.buf.slice(reader.pos, reader.pos + length);
        reader.pos += length;
        return value;
      }
      default:
        throw new Error("Unknown type of decoding context");
    }
  }
}

/**
 * A coder for a key-value pair.
 */
export class KVCoder<K, V> implements Coder<KV<K, V>> {
  type: string = "kvcoder";

  constructor(
    public keyCoder: Coder<K>,
    public valueCoder: Coder<V>,
  ) {}

  /**
   * The key is encoded with `Context.needsDelimiters`, while the value is
   * encoded with the input context of the `KVCoder`.
   */
  encode(element: KV<K, V>, writer: Writer, context: Context) {
    this.keyCoder.encode(element.key, writer, Context.needsDelimiters);
    this.valueCoder.encode(element.value, writer, context);
  }

  decode(reader: Reader, context: Context): KV<K, V> {
    const key = this.keyCoder.decode(reader, Context.needsDelimiters);
    const value = this.valueCoder.decode(reader, context);
    return {
      key: key,
      value: value,
    };
  }
}

/**
 * Swap the endianness of the input number. The input number is expected to be
 * a 32-bit integer.
 */
function swapEndian32(x: number): number {
  return (
    ((x & 0xff000000) >>> 24) |
    ((x & 0x00ff0000) >> 8) |
    ((x & 0x0000ff00) << 8) |
    ((x & 0x000000ff) << 24)
  );
}

/**
 * A coder for a 'list' or a series of elements of the same type.
 */
export class IterableCoder<T> implements Coder<Iterable<T>> {
  type: string = "iterablecoder";

  constructor(public elementCoder: Coder<T>) {}

  /**
   * The length is written first as a 32-bit big-endian integer, then each
   * element in `Context.needsDelimiters`.
   *
   * For example:
   * ```js
   * let w1 = new Writer()
   * new IterableCoder(new StrUtf8Coder()).encode(["a", "b", "c"], w1, Context.needsDelimiters)
   * console.log(w1.finish())  // ==> prints
   * // Uint8Array(10) [
   * //    0, 0,  0, 3,  1,
   * //    97, 1, 98, 1, 99
   * // ]
   * ```
   */
  encode(element: Iterable<T>, writer: Writer, context: Context) {
    const items = Array.from(element);
    writer.fixed32(swapEndian32(items.length));
    for (const item of items) {
      this.elementCoder.encode(item, writer, Context.needsDelimiters);
    }
  }

  /**
   * Reads both the length-prefixed form above and the batched form, where a
   * length of -1 is followed by batches each prefixed with their size and
   * ended by an empty batch.
   */
  decode(reader: Reader, context: Context): T[] {
    const len = swapEndian32(reader.fixed32());
    const result: T[] = [];
    if (len >= 0) {
      for (let i = 0; i < len; i++) {
        result.push(this.elementCoder.decode(reader, Context.needsDelimiters));
      }
      return result;
    }
    while (true) {
      const count = reader.int32();
      if (count === 0) {
        return result;
      }
      for (let i = 0; i < count; i++) {
        result.push(this.elementCoder.decode(reader, Context.needsDelimiters));
      }
    }
  }
}

////////// Windowing-related coders. //////////

export class GlobalWindowCoder implements WindowCoder<GlobalWindow> {
  static INSTANCE: GlobalWindowCoder = new GlobalWindowCoder();

  encode(value: GlobalWindow, writer: Writer, context: Context) {}

  decode(reader: Reader, context: Context) {
    return new GlobalWindow();
  }

  isWindow(window: Window): window is GlobalWindow {
    return window instanceof GlobalWindow;
  }
}

export class InstantCoder implements Coder<Instant> {
  static INSTANCE: InstantCoder = new InstantCoder();
  static INSTANT_BYTES = 8;

  // Shifted by Long.MIN_VALUE so that byte order matches timestamp order.
  decode(reader: Reader, context: Context): Instant {
    const shiftedMillis = Long.fromBytesBE(
      Array.from(
        reader.buf.slice(reader.pos, reader.pos + InstantCoder.INSTANT_BYTES),
      ),
    );
    reader.pos += InstantCoder.INSTANT_BYTES;
    return shiftedMillis.add(Long.MIN_VALUE);
  }

  encode(element: Instant, writer: Writer, context: Context) {
    const shiftedMillis = element.sub(Long.MIN_VALUE);
    const bytes = Uint8Array.from(shiftedMillis.toBytesBE());
    writeRawBytes(bytes, writer);
  }
}

// 4 bits
enum PaneInfoEncoding {
  NO_INDEX = 0b0000,

  ONE_INDEX = 0b0001,

  // both overall pane index and also the on-time index
  TWO_INDICES = 0b0010,
}

export class PaneInfoCoder implements Coder<PaneInfo> {
  static INSTANCE = new PaneInfoCoder();

  private static decodeTiming(timingNumber: number): Timing {
    switch (timingNumber) {
      case 0b00:
        return Timing.EARLY;
      case 0b01:
        return Timing.ON_TIME;
      case 0b10:
        return Timing.LATE;
      case 0b11:
        return Timing.UNKNOWN;
      default:
        throw new Error(
          "Timing number 0b" +
            timingNumber.toString(2) +
            " has more than two bits of info",
        );
    }
  }

  private static encodeTiming(timing: Timing): number {
    switch (timing) {
      case Timing.EARLY:
        return 0b00;
      case Timing.ON_TIME:
        return 0b01;
      case Timing.LATE:
        return 0b10;
      case Timing.UNKNOWN:
        return 0b11;
      default:
        throw new Error("Unknown timing constant: " + timing);
    }
  }

  private static chooseEncoding(value: PaneInfo): PaneInfoEncoding {
    if (
      (value.index === 0 && value.onTimeIndex === 0) ||
      value.timing === Timing.UNKNOWN
    ) {
      return PaneInfoEncoding.NO_INDEX;
    } else if (
      value.index === value.onTimeIndex ||
      value.timing === Timing.EARLY
    ) {
      return PaneInfoEncoding.ONE_INDEX;
    } else {
      return PaneInfoEncoding.TWO_INDICES;
    }
  }

  decode(reader: Reader, context: Context): PaneInfo {
    const headerByte = reader.buf[reader.pos];
    reader.pos += 1;

    // low 4 bits are used regardless of encoding
    const isFirst = !!(headerByte & 0b00000001);
    const isLast = !!(headerByte & 0b00000010);
    const timing = PaneInfoCoder.decodeTiming((headerByte & 0b00001100) >> 2);

    // High 4 bits indicate how to interpret remaining 4 bits
    // and whether to read more from the input stream
    const encoding = (headerByte & 0xf0) >> 4;
    switch (encoding) {
      case PaneInfoEncoding.NO_INDEX:
        return {
          isFirst: isFirst,
          isLast: isLast,
          index: 0,
          onTimeIndex: 0,
          timing: timing,
        };

      case PaneInfoEncoding.ONE_INDEX: {
        // The on-time index can be derived from the pane index.
        const onlyIndex = reader.int32();
        return {
          isFirst: isFirst,
          isLast: isLast,
          index: onlyIndex,
          onTimeIndex: timing === Timing.EARLY ? -1 : onlyIndex,
          timing: timing,
        };
      }

      case PaneInfoEncoding.TWO_INDICES: {
        const paneIndex = reader.int32();
        const onTimeIndex = reader.int32();
        return {
          isFirst: isFirst,
          isLast: isLast,
          index: paneIndex,
          onTimeIndex: onTimeIndex,
          timing: timing,
        };
      }
      default:
        throw new Error("Unknown PaneInfo encoding 0x" + encoding.toString(16));
    }
  }

  encode(value: PaneInfo, writer: Writer, context: Context) {
    const low4 =
      (value.isFirst ? 0b00000001 : 0) |
      (value.isLast ? 0b00000010 : 0) |
      (PaneInfoCoder.encodeTiming(value.timing) << 2);

    const encodingNibble = PaneInfoCoder.chooseEncoding(value);
    writeRawByte(low4 | (encodingNibble << 4), writer);

    switch (encodingNibble) {
      case PaneInfoEncoding.NO_INDEX:
        // the header byte contains all the info
        return;
      case PaneInfoEncoding.ONE_INDEX:
        writer.int32(value.index);
        return;
      case PaneInfoEncoding.TWO_INDICES:
        writer.int32(value.index);
        writer.int32(value.onTimeIndex);
        return;
    }
  }
}

export class WindowedValueCoder<T, W extends Window>
  implements Coder<WindowedValue<T>>
{
  windowIterableCoder: IterableCoder<W>;

  constructor(
    public elementCoder: Coder<T>,
    public windowCoder: WindowCoder<W>,
  ) {
    this.windowIterableCoder = new IterableCoder(windowCoder);
  }

  encode(windowedValue: WindowedValue<T>, writer: Writer, context: Context) {
    InstantCoder.INSTANCE.encode(
      windowedValue.timestamp,
      writer,
      Context.needsDelimiters,
    );
    this.windowIterableCoder.encode(
      windowedValue.windows.map((w) => this.checkWindow(w)),
      writer,
      Context.needsDelimiters,
    );
    PaneInfoCoder.INSTANCE.encode(
      windowedValue.pane,
      writer,
      Context.needsDelimiters,
    );
    this.elementCoder.encode(windowedValue.value, writer, context);
  }

  decode(reader: Reader, context: Context): WindowedValue<T> {
    const timestamp = InstantCoder.INSTANCE.decode(
      reader,
      Context.needsDelimiters,
    );
    const windows = this.windowIterableCoder.decode(
      reader,
      Context.needsDelimiters,
    );
    const pane = PaneInfoCoder.INSTANCE.decode(reader, Context.needsDelimiters);
    const value = this.elementCoder.decode(reader, context);
    return {
      value: value,
      windows: windows,
      pane: pane,
      timestamp: timestamp,
    };
  }

  private checkWindow(window: Window): W {
    if (!this.windowCoder.isWindow(window)) {
      throw new Error(`Unexpected window type for ${window.toString()}`);
    }
    return window;
  }
}
