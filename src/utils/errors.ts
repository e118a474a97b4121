/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error formatting and handling utilities for Stillwatch.
 */

/* These utilities provide consistent error handling and formatting throughout the application. The formatError function extracts meaningful messages from various
 * error types, while isAbortError identifies the rejection a child process produces when its probe was cancelled on purpose.
 */

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if(hasMessage(error)) {

    message = error.message;
  } else {

    message = String(error);
  }

  // Strip trailing punctuation to prevent double punctuation when callers add their own.
  return message.replace(/[.!?]+$/, "");
}

/**
 * Checks whether an error is the rejection produced when an AbortSignal cancels an operation. Node's child_process and timers reject with an error named
 * "AbortError" (code ABORT_ERR) when their signal fires.
 * @param error - The error to check.
 * @returns True if the error came from an aborted signal.
 */
export function isAbortError(error: unknown): boolean {

  if(!(error instanceof Error)) {

    return false;
  }

  return (error.name === "AbortError") || ((error as NodeJS.ErrnoException).code === "ABORT_ERR");
}

/**
 * Type guard for non-Error objects that still carry a string message, such as plain objects rejected by third-party code.
 * @param value - The value to check.
 * @returns True if the value has a string message property.
 */
function hasMessage(value: unknown): value is { message: string } {

  return (typeof value === "object") && (value !== null) && ("message" in value) && (typeof value.message === "string");
}
