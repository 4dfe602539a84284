// backend/services/book/src/contracts/book.ts
import { z } from "zod";

/**
 * Book contracts (Zod)
 * --------------------
 *  - bookContract : what we send over the wire
 *  - bookWriteDto : POST/PUT body; whole-record replacement
 *  - bookRow      : a row of the `books` table as the pg driver returns it
 *
 * Notes:
 *  - `summary` travels as UTF-8 text and is stored as BYTEA.
 *  - The body only has to decode: absent fields become "" and unknown keys
 *    (including a client-sent `id`) are dropped. NOT NULL lives in the table.
 */

export const bookContract = z.object({
  id: z.number().int(),
  title: z.string(),
  author: z.string(),
  summary: z.string(),
});

export const bookWriteDto = z
  .object({
    title: z.string().default(""),
    author: z.string().default(""),
    summary: z.string().default(""),
  })
  .strip();

export const bookRow = z.object({
  id: z.number().int(),
  title: z.string(),
  author: z.string(),
  summary: z.instanceof(Buffer).nullable(),
});

/** PostgreSQL `integer` range; ids outside it can never match a row. */
export const bookId = z
  .string()
  .trim()
  .regex(/^-?\d+$/, "Expected an integer id")
  .transform((v) => Number(v))
  .refine((n) => n >= -2147483648 && n <= 2147483647, "Id out of range");

export type Book = z.infer<typeof bookContract>;
export type BookInput = z.infer<typeof bookWriteDto>;
export type BookRow = z.infer<typeof bookRow>;
