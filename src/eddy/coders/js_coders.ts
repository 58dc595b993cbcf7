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

import * as BSON from "bson";
import { Writer, Reader } from "protobufjs";
import { Coder, Context } from "./coders";
import {
  BoolCoder,
  DoubleCoder,
  StrUtf8Coder,
  VarIntCoder,
} from "./standard_coders";
import { IterableCoder } from "./required_coders";

/**
 * A Coder<T> that encodes a javascript object with BSON.
 */
export class BsonObjectCoder<T extends BSON.Document> implements Coder<T> {
  encode(element: T, writer: Writer, context: Context) {
    const buff = BSON.serialize(element);
    writer.bytes(buff);
  }

  decode(reader: Reader, context: Context): T {
    const encoded = reader.bytes();
    return BSON.deserialize(encoded) as T;
  }
}

class NumberOrFloatCoder implements Coder<number> {
  intCoder: Coder<number> = new VarIntCoder();
  doubleCoder: Coder<number> = new DoubleCoder();

  encode(element: number, writer: Writer, context: Context) {
    if (Number.isInteger(element) && Math.abs(element) < 2 ** 31) {
      writer.string("i");
      this.intCoder.encode(element, writer, context);
    } else {
      writer.string("f");
      this.doubleCoder.encode(element, writer, context);
    }
  }

  decode(reader: Reader, context: Context): number {
    const typeMarker = reader.string();
    if (typeMarker === "f") {
      return this.doubleCoder.decode(reader, context);
    } else {
      return this.intCoder.decode(reader, context);
    }
  }
}

// BSON only serializes documents; copy the object's own fields into one.
class PlainObjectCoder implements Coder<object> {
  private bsonCoder = new BsonObjectCoder<BSON.Document>();

  encode(element: object, writer: Writer, context: Context) {
    this.bsonCoder.encode(
      Object.fromEntries(Object.entries(element)),
      writer,
      context,
    );
  }

  decode(reader: Reader, context: Context): object {
    return this.bsonCoder.decode(reader, context);
  }
}

type TypeName = "string" | "number" | "object" | "boolean" | "array";

/**
 * A Coder<T> that encodes common javascript types such as strings, numbers,
 * nulls, or objects. Used for combine accumulators that bring no coder of
 * their own.
 */
export class GeneralObjectCoder<T> implements Coder<T> {
  codersByType: Record<TypeName, Coder<unknown>> = {
    string: new StrUtf8Coder(),
    number: new NumberOrFloatCoder(),
    object: new PlainObjectCoder(),
    boolean: new BoolCoder(),
    array: new IterableCoder<unknown>(this),
  };

  // This is a map of type names to type markers. It maps a type name to its
  // marker within a stream.
  typeMarkers: Record<TypeName, string> = {
    string: "S",
    number: "N",
    object: "O",
    boolean: "B",
    array: "A",
  };

  // This is a map of type markers to type names. It maps a type marker to its
  // type name.
  markerToTypes: Record<string, TypeName | undefined> = {
    S: "string",
    N: "number",
    O: "object",
    B: "boolean",
    A: "array",
  };

  encode(element: T, writer: Writer, context: Context) {
    if (element === null || element === undefined) {
      // typeof is "object" but BSON can't handle it.
      writer.string("Z");
    } else {
      const type = typeName(element);
      writer.string(this.typeMarkers[type]);
      this.codersByType[type].encode(element, writer, context);
    }
  }

  decode(reader: Reader, context: Context): T {
    const typeMarker = reader.string();
    if (typeMarker === "Z") {
      return null as T;
    }
    const type = this.markerToTypes[typeMarker];
    if (type === undefined) {
      throw new Error("Unknown type marker " + typeMarker);
    }
    return this.codersByType[type].decode(reader, context) as T;
  }
}

function typeName(element: unknown): TypeName {
  if (Array.isArray(element)) {
    return "array";
  }
  const type = typeof element;
  switch (type) {
    case "string":
    case "number":
    case "object":
    case "boolean":
      return type;
    default:
      throw new Error("Cannot encode values of type " + type);
  }
}
