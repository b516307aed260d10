/**
 * Event document parser
 *
 * Turns the XML body of one repair-order event into a typed ParsedEvent, or a
 * ParseError describing the first problem found. Nothing is thrown for bad
 * input, and a document either parses completely or not at all.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { EventField, ParsedEvent, PartLine } from './types.js';
import { DataTransforms } from './transforms.js';
import { ParseError } from './utils.js';

export type ParseResult =
  | { ok: true; event: ParsedEvent }
  | { ok: false; error: ParseError };

const ROOT_TAG = 'event';
const PART_TAG = 'part';
const PART_JPATH = 'event.repair_details.repair_parts.part';

// Paths below <event>, except the part attributes which are relative to <part>
const FIELD_PATHS: Record<EventField, readonly string[]> = {
  order_id: ['order_id'],
  date_time: ['date_time'],
  status: ['status'],
  cost: ['cost'],
  technician: ['repair_details', 'technician'],
  repair_parts: ['repair_details', 'repair_parts'],
  part_name: ['@_name'],
  quantity: ['@_quantity'],
};

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  // a lone <part> would otherwise come back as an object rather than a list
  isArray: (_name, jpath) => jpath === PART_JPATH,
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function valueAt(node: unknown, field: EventField): unknown {
  let current: unknown = node;
  for (const key of FIELD_PATHS[field]) {
    if (!isNode(current)) return undefined;
    current = current[key];
  }
  return current;
}

function fail(
  reason: ParseError['reason'],
  message: string,
  field?: EventField,
  value?: unknown
): { ok: false; error: ParseError } {
  const context = value === undefined ? {} : { value };
  return { ok: false, error: new ParseError(reason, message, { field, context }) };
}

/**
 * Reads the text of a single-valued field. Elements that carry attributes keep
 * their text under '#text'.
 */
function textAt(node: unknown, field: EventField): { text: string } | { error: ParseError } {
  const value = valueAt(node, field);

  if (Array.isArray(value)) {
    return fail('invalid_value', `Field '${field}' appears more than once`, field);
  }

  const text = isNode(value) ? value['#text'] : value;
  if (typeof text !== 'string' || text.trim() === '') {
    return fail('missing_field', `Missing required field '${field}'`, field);
  }
  return { text: text.trim() };
}

function parseParts(root: XmlNode): { parts: PartLine[] } | { error: ParseError } {
  const repairParts = valueAt(root, 'repair_parts');
  if (repairParts === undefined) {
    return fail('missing_field', "Missing required field 'repair_parts'", 'repair_parts');
  }

  const raw = isNode(repairParts) ? repairParts[PART_TAG] : undefined;
  if (raw === undefined) {
    return fail('empty_parts', 'Repair parts block lists no parts', 'repair_parts');
  }

  const partList: unknown[] = Array.isArray(raw) ? raw : [raw];
  const parts: PartLine[] = [];
  const seen = new Set<string>();

  for (const part of partList) {
    const name = textAt(part, 'part_name');
    if ('error' in name) return name;

    const quantityText = textAt(part, 'quantity');
    if ('error' in quantityText) return quantityText;

    const quantity = DataTransforms.parseQuantity(quantityText.text);
    if (quantity === null) {
      return fail(
        'invalid_value',
        `Quantity for part '${name.text}' must be a positive integer`,
        'quantity',
        quantityText.text
      );
    }

    if (seen.has(name.text)) {
      return fail('duplicate_part', `Part '${name.text}' is listed more than once`, 'part_name', name.text);
    }
    seen.add(name.text);
    parts.push({ partName: name.text, quantity });
  }

  return { parts };
}

export function parseEvent(raw: string): ParseResult {
  const validation = XMLValidator.validate(raw);
  if (validation !== true) {
    const { msg, line } = validation.err;
    return fail('malformed_document', `Malformed XML at line ${line}: ${msg}`);
  }

  const document: unknown = xmlParser.parse(raw);
  const root = isNode(document) ? document[ROOT_TAG] : undefined;
  if (!isNode(root)) {
    return fail('malformed_document', `Document has no <${ROOT_TAG}> element`);
  }

  const orderIdText = textAt(root, 'order_id');
  if ('error' in orderIdText) return { ok: false, error: orderIdText.error };
  const orderId = DataTransforms.parseInteger(orderIdText.text);
  if (orderId === null) {
    return fail('invalid_value', 'Order id must be an integer', 'order_id', orderIdText.text);
  }

  const dateTimeText = textAt(root, 'date_time');
  if ('error' in dateTimeText) return { ok: false, error: dateTimeText.error };
  const timestamp = DataTransforms.parseTimestamp(dateTimeText.text);
  if (timestamp === null) {
    return fail(
      'invalid_timestamp',
      'Timestamp must be formatted YYYY-MM-DDTHH:MM:SS',
      'date_time',
      dateTimeText.text
    );
  }

  const statusText = textAt(root, 'status');
  if ('error' in statusText) return { ok: false, error: statusText.error };
  const status = DataTransforms.repairStatus(statusText.text);
  if (status === null) {
    return fail('invalid_value', `Unknown status '${statusText.text}'`, 'status', statusText.text);
  }

  const costText = textAt(root, 'cost');
  if ('error' in costText) return { ok: false, error: costText.error };
  const cost = DataTransforms.parseCost(costText.text);
  if (cost === null) {
    return fail('invalid_value', 'Cost must be a non-negative number', 'cost', costText.text);
  }

  const technician = textAt(root, 'technician');
  if ('error' in technician) return { ok: false, error: technician.error };

  const parts = parseParts(root);
  if ('error' in parts) return { ok: false, error: parts.error };

  return {
    ok: true,
    event: {
      orderId,
      timestamp,
      status,
      cost,
      technician: technician.text,
      parts: parts.parts,
    },
  };
}
