import { z } from "zod";

import { createError, err, ok, ShellpassErrorCodes, type DomainError, type Result } from "@shellpass/contracts";

/** Free-mail providers refused by default; visitors are asked for a company address. */
export const DEFAULT_BLOCKED_EMAIL_DOMAINS: ReadonlyArray<string> = [
  "gmail.com",
  "yahoo.com",
  "hotmail.com",
  "outlook.com",
  "aol.com",
  "icloud.com",
  "mail.com",
  "protonmail.com",
  "zoho.com",
  "yandex.com",
  "gmx.com",
  "live.com",
  "msn.com",
  "me.com",
  "inbox.com",
];

const emailSchema = z
  .string({ required_error: "Email is required.", invalid_type_error: "Email must be a string." })
  .trim()
  .toLowerCase()
  .min(1, "Email is required.")
  .max(254, "Email is too long.")
  .email("Enter a valid email address.");

const invalidEmail = (message: string, details?: Record<string, unknown>): DomainError =>
  createError(ShellpassErrorCodes.invalidEmail, message, details);

/**
 * Normalizes a visitor email (trimmed, lower-cased) and refuses malformed addresses and
 * addresses on a blocked domain.
 */
export const normalizeEmail = (
  input: unknown,
  blockedDomains: ReadonlySet<string>,
): Result<string, DomainError> => {
  const parsed = emailSchema.safeParse(input);
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    return err(invalidEmail(first?.message ?? "Enter a valid email address."));
  }

  const email = parsed.data;
  const domain = email.slice(email.lastIndexOf("@") + 1);
  if (blockedDomains.has(domain)) {
    return err(invalidEmail("Please use your company email address.", { domain }));
  }
  return ok(email);
};

export const toDomainSet = (domains: ReadonlyArray<string>): ReadonlySet<string> =>
  new Set(domains.map((domain) => domain.trim().toLowerCase()).filter((domain) => domain.length > 0));
