/**
 * Zod schemas for property keys and values.
 *
 * These describe what the line-oriented format can hold, not what a value
 * means. A key must read back as itself: it may not be blank, contain `=`
 * or a line break, carry surrounding whitespace (the parser trims it) or
 * start with a comment marker. A value may not contain a line break.
 */

import { z } from 'zod'
import { InvalidKeyError, InvalidValueError } from '../../core/errors.js'
import { COMMENT_PREFIXES } from '../codec/properties-codec.js'

const LINE_BREAK = /[\r\n]/

export const PropertyKeySchema = z
  .string()
  .min(1, 'key must not be empty')
  .refine((key) => key === '' || key.trim() !== '', 'key must not be blank')
  .refine((key) => !key.includes('='), 'key must not contain "="')
  .refine((key) => !LINE_BREAK.test(key), 'key must not contain a line break')
  .refine(
    (key) => key.trim() === '' || key.trim() === key,
    'key must not have leading or trailing whitespace'
  )
  .refine(
    (key) => !COMMENT_PREFIXES.some((prefix) => key.trimStart().startsWith(prefix)),
    `key must not start with a comment marker (${COMMENT_PREFIXES.join(' or ')})`
  )

export const PropertyValueSchema = z
  .string()
  .refine((value) => !LINE_BREAK.test(value), 'value must not contain a line break')

export const PropertyValuesSchema = z.array(PropertyValueSchema)

/** @throws {InvalidKeyError} */
export function assertValidKey(key: string): void {
  const result = PropertyKeySchema.safeParse(key)
  if (!result.success) {
    throw new InvalidKeyError(key, result.error.issues[0]?.message ?? 'invalid key')
  }
}

/** @throws {InvalidValueError} */
export function assertValidValue(key: string, value: string): void {
  const result = PropertyValueSchema.safeParse(value)
  if (!result.success) {
    throw new InvalidValueError(key, value, result.error.issues[0]?.message ?? 'invalid value')
  }
}

/** @throws {InvalidValueError} naming the first offending element */
export function assertValidValues(key: string, values: readonly string[]): void {
  const result = PropertyValuesSchema.safeParse(values)
  if (!result.success) {
    const issue = result.error.issues[0]
    const index = typeof issue?.path[0] === 'number' ? issue.path[0] : 0
    throw new InvalidValueError(
      key,
      values[index] ?? '',
      `element ${String(index)}: ${issue?.message ?? 'invalid value'}`
    )
  }
}
