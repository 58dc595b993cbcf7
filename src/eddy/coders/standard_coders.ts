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

import { Coder, Context, WindowCoder, writeRawBytes } from "./coders";
import { BytesCoder, InstantCoder } from "./required_coders";
import { IntervalWindow, Window } from "../values";

export * from "./required_coders";

/**
 * @fileoverview Coders for the primitive types users commonly key and
 * aggregate by, and for interval windows.
 */

export class StrUtf8Coder implements Coder<string> {
  static INSTANCE = new StrUtf8Coder();
  type = "stringutf8coder";
  encoder = new TextEncoder();
  decoder = new TextDecoder();

  encode(element: string, writer: Writer, context: Context) {
    const encodedElement = this.encoder.encode(element);
    BytesCoder.INSTANCE.encode(encodedElement, writer, context);
  }

  decode(reader: Reader, context: Context): string {
    return this.decoder.decode(BytesCoder.INSTANCE.decode(reader, context));
  }
}

export class VarIntCoder implements Coder<number> {
  static INSTANCE = new VarIntCoder();

  type = "varintcoder";

  encode(element: number, writer: Writer) {
    writer.int32(element);
  }

  decode(reader: Reader): number {
    return reader.int32();
  }
}

/** A variable-length coder for 64-bit integers such as durations. */
export class VarLongCoder implements Coder<Long> {
  static INSTANCE = new VarLongCoder();

  encode(element: Long, writer: Writer) {
    writer.int64(element);
  }

  decode(reader: Reader): Long {
    return Long.fromValue(reader.int64());
  }
}

export class DoubleCoder implements Coder<number> {
  static INSTANCE = new DoubleCoder();

  encode(element: number, writer: Writer) {
    const farr = new Float64Array([element]);
    const barr = new Uint8Array(farr.buffer).reverse();
    writeRawBytes(barr, writer);
  }

  decode(reader: Reader): number {
    const dView = new DataView(
      reader.buf.buffer,
      reader.buf.byteOffset + reader.pos,
      8,
    );
    reader.pos += 8;
    return dView.getFloat64(0, false);
  }
}

export class BoolCoder implements Coder<boolean> {
  static INSTANCE = new BoolCoder();
  type = "boolcoder";

  encode(element: boolean, writer: Writer) {
    writer.bool(element);
  }

  decode(reader: Reader): boolean {
    return reader.bool();
  }
}

export class NullableCoder<T> implements Coder<T | undefined> {
  type = "nullablecoder";

  constructor(public elementCoder: Coder<T>) {}

  encode(element: T | undefined, writer: Writer, context: Context) {
    if (element === null || element === undefined) {
      writer.bool(false);
    } else {
      writer.bool(true);
      this.elementCoder.encode(element, writer, context);
    }
  }

  decode(reader: Reader, context: Context): T | undefined {
    if (reader.bool()) {
      return this.elementCoder.decode(reader, context);
    } else {
      return undefined;
    }
  }
}

export class IntervalWindowCoder implements WindowCoder<IntervalWindow> {
  static INSTANCE: IntervalWindowCoder = new IntervalWindowCoder();

  encode(value: IntervalWindow, writer: Writer, context: Context) {
    InstantCoder.INSTANCE.encode(value.end, writer, context);
    writer.int64(value.end.sub(value.start));
  }

  decode(reader: Reader, context: Context) {
    const end = InstantCoder.INSTANCE.decode(reader, context);
    const duration = Long.fromValue(reader.int64());
    return new IntervalWindow(end.sub(duration), end);
  }

  isWindow(window: Window): window is IntervalWindow {
    return window instanceof IntervalWindow;
  }
}
