import { Client } from "@notionhq/client";
import type { CreatePageParameters } from "@notionhq/client/build/src/api-endpoints";
import { ApplicationSink, JobApplication } from "../types";
import { logger } from "../utils/logger";

type PageProperties = CreatePageParameters["properties"];

const NOTION_TEXT_LIMIT = 2000;

const REQUIRED_PROPERTIES = [
  "Company",
  "Position",
  "Date Applied",
  "Confidence",
  "Source",
  "Notes",
  "Message ID",
];

const richText = (content: string) => ({
  rich_text: [{ text: { content: content.slice(0, NOTION_TEXT_LIMIT) } }],
});

export function buildProperties(app: JobApplication): PageProperties {
  const properties: PageProperties = {
    Company: {
      title: [{ text: { content: app.company } }],
    },
    Position: richText(app.position),
    "Date Applied": {
      date: { start: app.dateApplied },
    },
    Confidence: {
      number: app.confidence,
    },
    "Message ID": richText(app.sourceMessageId),
  };

  if (app.source) {
    properties["Source"] = richText(app.source);
  }

  if (app.notes) {
    properties["Notes"] = richText(app.notes);
  }

  return properties;
}

export class NotionApplicationSink implements ApplicationSink {
  private readonly notion: Client;

  constructor(token: string, private readonly databaseId: string) {
    this.notion = new Client({ auth: token });
  }

  async appendApplications(applications: JobApplication[]): Promise<number> {
    for (const app of applications) {
      try {
        await this.notion.pages.create({
          parent: { database_id: this.databaseId },
          properties: buildProperties(app),
        });
        logger.info(`Created Notion entry: ${app.company} - ${app.position}`);
      } catch (error) {
        logger.error(`Failed to create Notion entry for ${app.company}`, error);
        throw error;
      }
    }
    return applications.length;
  }

  /**
   * Verify the database exists and has the right schema.
   */
  async verifyDatabase(): Promise<boolean> {
    try {
      const db = await this.notion.databases.retrieve({
        database_id: this.databaseId,
      });

      const properties = Object.keys(db.properties);
      const missing = REQUIRED_PROPERTIES.filter(
        (name) => !properties.includes(name)
      );

      if (missing.length > 0) {
        logger.error(
          `Notion database is missing properties: ${missing.join(", ")}`
        );
        logger.info(
          "Required properties: Company (Title), Position (Text), Date Applied (Date), Confidence (Number), Source (Text), Notes (Text), Message ID (Text)"
        );
        return false;
      }

      logger.info("Notion database verified successfully");
      return true;
    } catch (error) {
      logger.error("Failed to verify Notion database", error);
      return false;
    }
  }
}
