/**
 * Component loggers: `debug` output under `bridge:<component>:<level>`,
 * mirrored to Sentry as breadcrumbs and logs. Warnings and errors are
 * captured as events.
 */

import * as Sentry from "@sentry/node";
import debug, { type Debugger } from "debug";

export type LogExtra = Record<string, unknown>;

export interface LogChannels {
  debug: Debugger;
  warn: Debugger;
  error: Debugger;
}

type CaptureContext = Sentry.CaptureContext;

const hasEntries = (extra: LogExtra | undefined): extra is LogExtra =>
  extra !== undefined && Object.keys(extra).length > 0;

export class Logger {
  private readonly component: string;
  private readonly channels: LogChannels;

  constructor(component: string, channels: LogChannels) {
    this.component = component;
    this.channels = channels;
  }

  debug(message: string, extra?: LogExtra): void {
    this.write(this.channels.debug, message, extra);
    this.trail("debug", message, extra);
    Sentry.logger.debug(message, { component: this.component, ...extra });
  }

  warn(message: string, extra?: LogExtra): void {
    this.write(this.channels.warn, message, extra);
    this.trail("warning", message, extra);
    Sentry.logger.warn(message, { component: this.component, ...extra });
    Sentry.captureMessage(message, this.captureContext("warning", extra));
  }

  error(message: string, error?: unknown, extra?: LogExtra): void {
    if (error === undefined) {
      this.write(this.channels.error, message, extra);
    } else {
      this.channels.error("%s %O", message, error);
    }
    this.trail("error", message, extra);
    Sentry.logger.error(message, {
      component: this.component,
      ...extra,
      error: error instanceof Error ? error.message : error,
    });

    const context = this.captureContext("error", extra);
    if (error === undefined) {
      Sentry.captureMessage(message, context);
    } else {
      Sentry.captureException(error, context);
    }
  }

  private write(channel: Debugger, message: string, extra?: LogExtra): void {
    if (hasEntries(extra)) {
      channel("%s %O", message, extra);
    } else {
      channel("%s", message);
    }
  }

  private captureContext(
    level: Sentry.SeverityLevel,
    extra?: LogExtra
  ): CaptureContext {
    return {
      level,
      tags: { component: this.component },
      ...(hasEntries(extra) ? { extra } : {}),
    };
  }

  // Component "google:mapper" becomes breadcrumb category "google.mapper"
  private trail(
    level: Sentry.SeverityLevel,
    message: string,
    extra?: LogExtra
  ): void {
    Sentry.addBreadcrumb({
      type: level === "warning" ? "default" : level,
      level,
      category: this.component.replace(":", "."),
      message,
      ...(extra ? { data: extra } : {}),
    });
  }
}

export const createLogger = (component: string): Logger =>
  new Logger(component, {
    debug: debug(`bridge:${component}:debug`),
    warn: debug(`bridge:${component}:warn`),
    error: debug(`bridge:${component}:error`),
  });
