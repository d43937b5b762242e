// SPDX-License-Identifier: Apache-2.0
import { getRequestId } from "./request-id.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function getMinLevel(): LogLevel {
  const env = process.env.LOG_LEVEL;
  if (isLogLevel(env)) return env;
  return process.env.NODE_ENV === "development" ? "debug" : "info";
}

export type LogFields = Record<string, unknown>;

export interface Logger {
  info(msg: string, extra?: LogFields): void;
  warn(msg: string, extra?: LogFields): void;
  error(msg: string, extra?: LogFields): void;
  debug(msg: string, extra?: LogFields): void;
  child(extra: LogFields): Logger;
}

/**
 * Flattens an unknown thrown value into loggable fields. Walks one level of `cause`
 * so wrapped ledger errors keep the node's original message.
 */
export function errorFields(err: unknown): LogFields {
  if (!(err instanceof Error)) return { error: String(err) };
  const fields: LogFields = { error: err.message, error_name: err.name };
  if (err.cause !== undefined) {
    fields.cause = err.cause instanceof Error ? err.cause.message : String(err.cause);
  }
  return fields;
}

function emit(
  level: LogLevel,
  service: string,
  msg: string,
  baseExtra: LogFields,
  extra?: LogFields,
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[getMinLevel()]) return;

  const line = JSON.stringify(
    {
      level,
      service,
      msg,
      request_id: getRequestId(),
      ts: new Date().toISOString(),
      ...baseExtra,
      ...extra,
    },
    (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
  );

  process.stdout.write(`${line}\n`);
}

export function createLogger(service: string, baseExtra: LogFields = {}): Logger {
  return {
    debug(msg, extra) {
      emit("debug", service, msg, baseExtra, extra);
    },
    info(msg, extra) {
      emit("info", service, msg, baseExtra, extra);
    },
    warn(msg, extra) {
      emit("warn", service, msg, baseExtra, extra);
    },
    error(msg, extra) {
      emit("error", service, msg, baseExtra, extra);
    },
    child(extra) {
      return createLogger(service, { ...baseExtra, ...extra });
    },
  };
}
