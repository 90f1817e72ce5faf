/**
 * Validation schemas and utilities for user input
 */

import { z } from 'zod';
import { ValidationError } from './errors';

export const MAX_OFFSET_MINUTES = 14 * 60;

// UTC offset (±HH:MM)
export const offsetSchema = z
  .string()
  .trim()
  .regex(/^[+-]\d{2}:\d{2}$/, {
    message: 'Offset must be in ±HH:MM format',
  })
  .transform((value, ctx) => {
    const sign = value.startsWith('-') ? -1 : 1;
    const hours = Number(value.slice(1, 3));
    const minutes = Number(value.slice(4, 6));
    const total = hours * 60 + minutes;
    if (minutes >= 60 || total > MAX_OFFSET_MINUTES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Offset must be between -14:00 and +14:00',
      });
      return z.NEVER;
    }
    return sign * total;
  });

// Time of day (HH:MM, 24-hour)
export const timeOfDaySchema = z
  .string()
  .regex(/^([01]?[0-9]|2[0-3]):[0-5][0-9]$/, {
    message: 'Time must be in HH:MM format (24-hour)',
  });

// Full date and time (DD.MM.YYYY HH:MM)
export const dateTimeSchema = z
  .string()
  .regex(/^\d{2}\.\d{2}\.\d{4} ([01]?[0-9]|2[0-3]):[0-5][0-9]$/, {
    message: 'Date must be in DD.MM.YYYY HH:MM format',
  });

// Telegram ID validation (must be positive integer)
export const telegramIdSchema = z.coerce.number().int().positive({
  message: 'Telegram ID must be a positive integer',
});

export const platformSchema = z.enum(['telegram', 'vk']);

// Short platform aliases used in bot commands and callback data
export const platformAliasSchema = z
  .enum(['tg', 'telegram', 'vk'])
  .transform((value): z.infer<typeof platformSchema> =>
    value === 'tg' ? 'telegram' : value,
  );

export const targetResultSchema = z.object({
  platform: platformSchema,
  externalId: z.string(),
  status: z.enum(['sent', 'failed']),
  method: z.enum(['forward', 'copy', 'post']).optional(),
  messageRef: z.string().optional(),
  reason: z
    .enum(['not_member', 'rate_limited', 'transient', 'other'])
    .optional(),
  error: z.string().optional(),
});

export const targetRefSchema = z.object({
  platform: platformSchema,
  externalId: z.string(),
  title: z.string(),
});

// Validation utility functions
export class ValidationUtils {
  /**
   * Parses a ±HH:MM offset into signed minutes
   */
  static parseOffset(offset: unknown): number {
    const result = offsetSchema.safeParse(offset);
    if (!result.success) {
      throw new ValidationError(
        `Invalid offset: ${result.error.errors[0]?.message || 'Validation failed'}`,
        'INVALID_OFFSET',
      );
    }
    return result.data;
  }

  /**
   * Validates Telegram ID format and constraints
   */
  static validateTelegramId(telegramId: unknown): number {
    const result = telegramIdSchema.safeParse(telegramId);
    if (!result.success) {
      throw new ValidationError(
        `Invalid Telegram ID: ${result.error.errors[0]?.message || 'Validation failed'}`,
      );
    }
    return result.data;
  }
}
