import * as core from "@actions/core";
import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";
import { basename } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import type { DigestConfig } from "../config.js";

export type EmailConfig = NonNullable<DigestConfig["email"]>;

/** The slice of a nodemailer transporter used for delivery. */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

// Connection-level failures reported by nodemailer; worth another attempt.
const RETRYABLE_CODES = new Set(["ECONNECTION", "ETIMEDOUT", "ESOCKET", "ECONNRESET"]);

function isRetryable(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    RETRYABLE_CODES.has(error.code)
  );
}

export function createTransport(email: EmailConfig): MailTransport {
  return nodemailer.createTransport({
    host: email.smtp_host,
    port: email.smtp_port,
    secure: email.smtp_port === 465,
    auth: {
      user: email.sender,
      pass: core.getInput("smtp_password"),
    },
    connectionTimeout: 30_000,
    socketTimeout: 30_000,
  });
}

export function buildMessage(reportPath: string, email: EmailConfig): SendMailOptions {
  return {
    from: email.sender,
    to: email.recipients.join(", "),
    subject: email.subject,
    text: "The latest open-source project digest is attached.",
    attachments: [{ filename: basename(reportPath), path: reportPath }],
  };
}

async function sendWithRetry(
  transport: MailTransport,
  message: SendMailOptions,
  email: EmailConfig
): Promise<void> {
  for (let attempt = 1; ; attempt++) {
    try {
      await transport.sendMail(message);
      return;
    } catch (error) {
      if (attempt >= email.max_attempts || !isRetryable(error)) throw error;

      const waitMs = attempt * email.retry_delay_ms;
      core.warning(
        `SMTP connection failed (attempt ${attempt}/${email.max_attempts}), retrying in ${waitMs}ms`
      );
      await sleep(waitMs);
    }
  }
}

/**
 * Emails the report to the configured recipients. Returns whether a message
 * was actually sent: false without an `email` section or in a dry run.
 */
export async function deliverReport(
  reportPath: string,
  config: DigestConfig,
  dryRun: boolean,
  transport?: MailTransport
): Promise<boolean> {
  const email = config.email;
  if (!email) {
    core.info("No email configured, skipping delivery");
    return false;
  }

  const recipients = email.recipients.join(", ");
  if (dryRun) {
    core.info(`[DRY RUN] Would email ${reportPath} to ${recipients}`);
    return false;
  }

  core.info(`Sending report to ${recipients}`);
  try {
    await sendWithRetry(transport ?? createTransport(email), buildMessage(reportPath, email), email);
  } catch (error) {
    core.error(
      `Email delivery failed: ${error instanceof Error ? error.message : String(error)}`
    );
    throw error;
  }

  core.info("Report delivered");
  return true;
}
