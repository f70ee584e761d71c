/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export { converted, rejected, describeNative, type Conversion, type ValueCodec } from './codec.js';
export { PrimitiveCodec, TextCodec, EnumerationCodec, narrowInteger } from './primitives.js';
export { SequenceCodec, PointerCodec } from './containers.js';
export { RecordCodec, type RecordField } from './records.js';
export { CodecCompiler } from './compiler.js';
