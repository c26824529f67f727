import fs from 'node:fs/promises';
import path from 'node:path';

import { resultCodes, type TestCase } from '@tally/core';

const NOT_RUN_MESSAGE = 'Test was not run';
const UNSUPPORTED_MESSAGE = 'Unsupported configuration';

// Code points XML 1.0 does not allow anywhere in a document, lone surrogates included.
const NON_XML_CHARS =
  /[\x00-\x08\x0b\x0c\x0e-\x1f\ufffe\uffff]|[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/g;

/** Replaces characters an XML 1.0 parser rejects, such as ANSI colour escapes, with U+FFFD. */
export function toXmlText(value: string): string {
  return value.replace(NON_XML_CHARS, '\ufffd');
}

function escapeAttribute(value: string): string {
  return toXmlText(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;')
    .replace(/\t/g, '&#9;');
}

/** Wraps text in CDATA, splitting any `]]>` so it cannot end the section early. */
export function toCdata(text: string): string {
  return `<![CDATA[${toXmlText(text).replace(/]]>/g, ']]]]><![CDATA[>')}]]>`;
}

function safeSuiteName(name: string): string {
  return name.replace(/\./g, '-');
}

function classNameOf(test: TestCase): string {
  const suiteName = safeSuiteName(test.suite.config.name);
  const dirs = test.pathInSuite.slice(0, -1).map((segment) => segment.replace(/\./g, '_'));
  return `${suiteName}.${dirs.length > 0 ? dirs.join('/') : suiteName}`;
}

function formatTestCase(test: TestCase): string {
  const result = test.result;
  const name = test.pathInSuite[test.pathInSuite.length - 1] ?? '';
  const time = (result?.elapsed ?? 0).toFixed(2);
  const open = `<testcase classname="${escapeAttribute(classNameOf(test))}" name="${escapeAttribute(name)}" time="${time}"`;

  if (!result) {
    return `${open}>\n\t<skipped message="${escapeAttribute(NOT_RUN_MESSAGE)}"/>\n</testcase>`;
  }
  if (result.code.isFailure) {
    return `${open}>\n\t<failure>${toCdata(result.output)}</failure>\n</testcase>`;
  }
  if (result.code === resultCodes.UNSUPPORTED) {
    const features = test.suite.availableFeatures;
    const message = features.length > 0 ? `${UNSUPPORTED_MESSAGE}: ${[...features].sort().join(' ')}` : UNSUPPORTED_MESSAGE;
    return `${open}>\n\t<skipped message="${escapeAttribute(message)}"/>\n</testcase>`;
  }
  return `${open}/>`;
}

type SuiteTally = { tests: TestCase[]; failures: number; skipped: number };

/**
 * JUnit XML with one `<testsuite>` per suite configuration name, in order of
 * first appearance. Tests that never ran are listed as skipped.
 */
export function buildJunitReport(tests: readonly TestCase[]): string {
  const bySuite = new Map<string, SuiteTally>();
  for (const test of tests) {
    const key = test.suite.config.name;
    let tally = bySuite.get(key);
    if (!tally) {
      tally = { tests: [], failures: 0, skipped: 0 };
      bySuite.set(key, tally);
    }
    tally.tests.push(test);
    const code = test.result?.code;
    if (!code || code === resultCodes.UNSUPPORTED) tally.skipped += 1;
    else if (code.isFailure) tally.failures += 1;
  }

  const lines = ['<?xml version="1.0" encoding="UTF-8"?>', '<testsuites>'];
  for (const [name, tally] of bySuite) {
    lines.push(
      `<testsuite name="${escapeAttribute(safeSuiteName(name))}" tests="${tally.tests.length}" failures="${tally.failures}" skipped="${tally.skipped}">`,
    );
    for (const test of tally.tests) lines.push(formatTestCase(test));
    lines.push('</testsuite>');
  }
  lines.push('</testsuites>');
  return `${lines.join('\n')}\n`;
}

export async function writeJunitReport(filePath: string, xml: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, xml, 'utf-8');
}
