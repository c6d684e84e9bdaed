import { hasAvailable, isUint32, isUint8, viewOf } from "@ledgerwire/helpers";
import { err, ok, type Result } from "neverthrow";

import {
  ACCOUNT_LAMPORTS_OFFSET,
  ACCOUNT_NAME_LENGTH_OFFSET,
  ACCOUNT_NAME_MAX_LENGTH,
  ACCOUNT_NAME_OFFSET,
  ACCOUNT_RECORD_HEADER_SIZE,
  ACCOUNT_TYPE_TAG_OFFSET,
} from "./constants";
import {
  fieldOutOfRange,
  invalidEncoding,
  truncatedInput,
  type CodecError,
} from "./errors";
import type { AccountRecord, AccountRecordInput } from "./types";

const TEXT_DECODER = new TextDecoder("utf-8", { fatal: true });
const TEXT_ENCODER = new TextEncoder();
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Parses an account record buffer.
 *
 * Layout: type tag at 0, lamports (u32 LE) at 4, name length at 8, name
 * bytes from 12. Exactly `nameLength` name bytes are read; anything after
 * them is ignored.
 */
export function parseAccountRecord(data: Uint8Array): Result<AccountRecord, CodecError> {
  if (data.length < ACCOUNT_RECORD_HEADER_SIZE) {
    return err(truncatedInput("account record header", ACCOUNT_RECORD_HEADER_SIZE, data.length));
  }

  const view = viewOf(data);
  const typeTag = view.getUint8(ACCOUNT_TYPE_TAG_OFFSET);
  const lamports = view.getUint32(ACCOUNT_LAMPORTS_OFFSET, true);
  const nameLength = view.getUint8(ACCOUNT_NAME_LENGTH_OFFSET);

  if (!hasAvailable(data.length, ACCOUNT_NAME_OFFSET, nameLength)) {
    return err(truncatedInput("account name", ACCOUNT_NAME_OFFSET + nameLength, data.length));
  }
  const nameBytes = data.slice(ACCOUNT_NAME_OFFSET, ACCOUNT_NAME_OFFSET + nameLength);

  return decodeName(nameBytes).map((name) => ({
    typeTag,
    lamports,
    nameLength,
    nameBytes,
    name,
  }));
}

export function encodeAccountRecord(input: AccountRecordInput): Result<Uint8Array, CodecError> {
  if (!isUint8(input.typeTag)) {
    return err(fieldOutOfRange("typeTag", input.typeTag, 0xff));
  }
  if (!isUint32(input.lamports)) {
    return err(fieldOutOfRange("lamports", input.lamports, 0xffffffff));
  }
  // TextEncoder would write U+FFFD for these.
  if (LONE_SURROGATE.test(input.name)) {
    return err(invalidEncoding("account name"));
  }
  const nameBytes = TEXT_ENCODER.encode(input.name);
  if (nameBytes.length > ACCOUNT_NAME_MAX_LENGTH) {
    return err(fieldOutOfRange("name", nameBytes.length, ACCOUNT_NAME_MAX_LENGTH));
  }

  const bytes = new Uint8Array(ACCOUNT_NAME_OFFSET + nameBytes.length);
  const view = viewOf(bytes);
  view.setUint8(ACCOUNT_TYPE_TAG_OFFSET, input.typeTag);
  view.setUint32(ACCOUNT_LAMPORTS_OFFSET, input.lamports, true);
  view.setUint8(ACCOUNT_NAME_LENGTH_OFFSET, nameBytes.length);
  bytes.set(nameBytes, ACCOUNT_NAME_OFFSET);
  return ok(bytes);
}

function decodeName(bytes: Uint8Array): Result<string, CodecError> {
  try {
    return ok(TEXT_DECODER.decode(bytes));
  } catch (error) {
    if (error instanceof TypeError) {
      return err(invalidEncoding("account name"));
    }
    throw error;
  }
}
