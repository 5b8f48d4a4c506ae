import { google, gmail_v1 } from "googleapis";
import { EmailHeaders, MailSource, RawEmail } from "../types";
import { AppConfig } from "../utils/config";
import { logger } from "../utils/logger";

type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;

const KEPT_HEADERS = ["from", "to", "subject", "date"] as const;
const PAGE_SIZE = 50;

/**
 * OAuth client for the account that owns the inbox. The refresh token
 * comes from `npm run auth` and must carry the Gmail and Sheets scopes.
 */
export function createOAuthClient(gmail: AppConfig["gmail"]): OAuth2Client {
  const oauth2Client = new google.auth.OAuth2(
    gmail.clientId,
    gmail.clientSecret,
    gmail.redirectUri
  );
  oauth2Client.setCredentials({ refresh_token: gmail.refreshToken });
  return oauth2Client;
}

export function getEmailHeaders(
  payload?: gmail_v1.Schema$MessagePart
): EmailHeaders {
  const headers: EmailHeaders = {};

  for (const header of payload?.headers ?? []) {
    const name = header.name?.toLowerCase();
    const kept = KEPT_HEADERS.find((key) => key === name);
    if (kept) {
      headers[kept] = header.value ?? "";
    }
  }

  return headers;
}

function decodeBase64(data: string): string {
  return Buffer.from(data, "base64url").toString("utf-8");
}

const hasData = (part: gmail_v1.Schema$MessagePart, mimeType: string) =>
  part.mimeType === mimeType && Boolean(part.body?.data);

/**
 * Best text payload of a message: a text/plain part if there is one,
 * otherwise text/html, looking at the top-level parts and one level below
 * them, and finally the top-level body itself.
 */
export function getEmailBody(payload?: gmail_v1.Schema$MessagePart): string {
  if (!payload) return "";

  const parts = (payload.parts ?? []).flatMap((part) => [
    part,
    ...(part.parts ?? []),
  ]);

  const best =
    parts.find((part) => hasData(part, "text/plain")) ??
    parts.find((part) => hasData(part, "text/html"));
  const data = best?.body?.data ?? payload.body?.data;

  return data ? decodeBase64(data) : "";
}

export class GmailMailSource implements MailSource {
  constructor(
    private readonly gmail: gmail_v1.Gmail,
    private readonly options: { queryDays: number; maxResults: number }
  ) {}

  static fromConfig(config: AppConfig["gmail"]): GmailMailSource {
    const gmail = google.gmail({ version: "v1", auth: createOAuthClient(config) });
    return new GmailMailSource(gmail, config);
  }

  async fetchRecentEmails(): Promise<RawEmail[]> {
    const query = `in:inbox newer_than:${this.options.queryDays}d`;
    logger.info(`Fetching up to ${this.options.maxResults} inbox emails`, {
      query,
    });

    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      const response = await this.gmail.users.messages.list({
        userId: "me",
        q: query,
        maxResults: Math.min(PAGE_SIZE, this.options.maxResults - ids.length),
        pageToken,
      });

      for (const message of response.data.messages ?? []) {
        if (message.id) ids.push(message.id);
      }

      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken && ids.length < this.options.maxResults);

    logger.info(`Found ${ids.length} emails`);

    const emails: RawEmail[] = [];
    for (const id of ids) {
      const email = await this.getMessage(id);
      if (email) emails.push(email);
    }
    return emails;
  }

  private async getMessage(messageId: string): Promise<RawEmail | null> {
    try {
      const response = await this.gmail.users.messages.get({
        userId: "me",
        id: messageId,
        format: "full",
      });

      return {
        id: messageId,
        headers: getEmailHeaders(response.data.payload),
        body: getEmailBody(response.data.payload),
      };
    } catch (error) {
      logger.error(`Failed to fetch message ${messageId}`, error);
      return null;
    }
  }

  async trashEmail(id: string): Promise<void> {
    await this.gmail.users.messages.trash({ userId: "me", id });
    logger.info(`Moved email ${id} to trash`);
  }
}
