import nodemailer from "nodemailer";
import type { SendMailOptions, Transporter } from "nodemailer";
import winston from "winston";
import { escape } from "lodash";
import { LimsApi } from "./lims/lims-api";
import { PublishedBundle } from "./seqbundle-types";
import { errorMessage } from "./seqbundle-errors";
import { StageResult } from "./processing-result";

export type NotifierOptions = {
  // when false we only log who would have been emailed
  sendEmails: boolean;
  smtpHost: string;
  smtpPort: number;
  from: string;
};

/**
 * The part of a nodemailer transport we use.
 */
export type MailTransport = Pick<Transporter, "sendMail">;

export function notificationSubject(p: PublishedBundle): string {
  return `Sequencing Files Available - ${p.owner.name}`;
}

export function notificationText(p: PublishedBundle): string {
  return [
    `Sequencing files for project ${p.owner.name} (${p.owner.id}) are now available.`,
    "",
    `Archive: ${p.filename}`,
    `Files: ${p.fileCount}`,
    "",
    ...p.filenames.map((f) => `  ${f}`),
    "",
  ].join("\n");
}

export function notificationHtml(p: PublishedBundle): string {
  const items = p.filenames.map((f) => `<li>${escape(f)}</li>`).join("");

  return [
    `<p>Sequencing files for project <strong>${escape(p.owner.name)}</strong> (${escape(p.owner.id)}) are now available.</p>`,
    `<p>Archive: ${escape(p.filename)}<br/>Files: ${p.fileCount}</p>`,
    `<ul>${items}</ul>`,
  ].join("\n");
}

/**
 * Lets the researcher of a project know that files have been published to it.
 */
export class Notifier {
  private readonly logger: winston.Logger;
  private _transport?: MailTransport;

  constructor(
    private _lims: LimsApi,
    private _options: NotifierOptions,
    logger: winston.Logger,
    transport?: MailTransport,
  ) {
    this.logger = logger.child({ component: "notifier" });
    this._transport = transport;
  }

  public async notifyAll(published: PublishedBundle[]): Promise<StageResult> {
    const errors: string[] = [];

    for (const p of published) {
      const problem = await this.notify(p);

      if (problem) errors.push(problem);
    }

    return { counters: {}, errors };
  }

  /**
   * @returns a description of what went wrong - or undefined if the
   * researcher was notified (or would have been, with emails turned off)
   */
  public async notify(p: PublishedBundle): Promise<string | undefined> {
    this.logger.info(`Preparing email notification for project: ${p.owner.name}`);

    let email: string | undefined;

    try {
      email = await this.researcherEmail(p);
    } catch (e) {
      this.logger.error(`Could not get researcher email: ${errorMessage(e)}`);
      return `Could not notify researcher of ${p.owner.name}: ${errorMessage(e)}`;
    }

    if (!email) {
      this.logger.error("Could not get researcher email, skipping notification");
      return `No researcher email for project ${p.owner.name}`;
    }

    const message: SendMailOptions = {
      from: this._options.from,
      to: email,
      subject: notificationSubject(p),
      text: notificationText(p),
      html: notificationHtml(p),
    };

    if (!this._options.sendEmails) {
      this.logger.info(`Emails disabled - would have sent to ${email}`);
      this.logger.info(`  Subject: ${message.subject}`);
      this.logger.info(`  Files: ${p.fileCount} files in ${p.filename}`);
      return undefined;
    }

    try {
      this.logger.info(`Sending email to: ${email}`);
      await this.transport().sendMail(message);
      this.logger.info(`✓ Email sent successfully to ${email}`);
      return undefined;
    } catch (e) {
      this.logger.error(`Could not send email: ${errorMessage(e)}`);
      return `Could not email ${email} about ${p.filename}: ${errorMessage(e)}`;
    }
  }

  private async researcherEmail(p: PublishedBundle): Promise<string | undefined> {
    const project = await this._lims.getProject(p.owner.uri);

    if (!project.researcher) return undefined;

    const researcher = await this._lims.getResearcher(project.researcher.uri);

    return researcher.email;
  }

  private transport(): MailTransport {
    if (!this._transport)
      this._transport = nodemailer.createTransport({
        host: this._options.smtpHost,
        port: this._options.smtpPort,
        secure: false,
      });

    return this._transport;
  }
}
