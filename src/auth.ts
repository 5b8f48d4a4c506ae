/**
 * Prints a Google consent URL and trades the returned code for the
 * refresh token the tracker runs on (`GMAIL_REFRESH_TOKEN`).
 *
 * The OAuth client needs the Gmail and Sheets APIs enabled and its id and
 * secret in `.env`. Run with `npm run auth`.
 */

import { google } from "googleapis";
import * as readline from "readline";
import dotenv from "dotenv";
import path from "path";

dotenv.config({ path: path.resolve(process.cwd(), ".env") });

const DEFAULT_REDIRECT_URI = "http://localhost:3000/oauth2callback";

// modify: read and trash processed emails; spreadsheets: append rows
const SCOPES = [
  "https://www.googleapis.com/auth/gmail.modify",
  "https://www.googleapis.com/auth/spreadsheets",
];

function ask(prompt: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(prompt, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function requestRefreshToken(): Promise<number> {
  const { GMAIL_CLIENT_ID, GMAIL_CLIENT_SECRET, GMAIL_REDIRECT_URI } =
    process.env;
  if (!GMAIL_CLIENT_ID || !GMAIL_CLIENT_SECRET) {
    console.error("GMAIL_CLIENT_ID and GMAIL_CLIENT_SECRET must be set in .env");
    return 1;
  }

  const client = new google.auth.OAuth2(
    GMAIL_CLIENT_ID,
    GMAIL_CLIENT_SECRET,
    GMAIL_REDIRECT_URI || DEFAULT_REDIRECT_URI
  );

  const consentUrl = client.generateAuthUrl({
    access_type: "offline",
    scope: SCOPES,
    prompt: "consent",
  });

  console.log(`\nGrant inbox and spreadsheet access here:\n\n${consentUrl}\n`);
  console.log("Google redirects to a URL ending in ?code=...; copy that value.\n");

  const code = await ask("Authorization code: ");
  if (!code) {
    console.error("No code entered");
    return 1;
  }

  const { tokens } = await client.getToken(decodeURIComponent(code));
  if (!tokens.refresh_token) {
    console.error(
      "No refresh token in the response. Remove the app under your Google account's third-party access and try again."
    );
    return 1;
  }

  console.log("\nAdd this line to .env:\n");
  console.log(`GMAIL_REFRESH_TOKEN=${tokens.refresh_token}`);
  return 0;
}

requestRefreshToken()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Token exchange failed:", error);
    process.exitCode = 1;
  });
