import { DeliveryError } from "../errors";
import type { ReportDelivery, ReportDocument } from "../types";

const RESEND_ENDPOINT = "https://api.resend.com/emails";

export type EmailSettings = {
  apiKey: string;
  from: string;
  to: string[];
};

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

function getEnv(env: NodeJS.ProcessEnv, name: string): string {
  return env[name]?.trim() ?? "";
}

/**
* Reads delivery settings from the environment. Missing settings fail the run: a report that
* cannot be delivered is not a partial success.
*/
export function loadEmailSettings(env: NodeJS.ProcessEnv = process.env): EmailSettings {
  const apiKey = getEnv(env, "RESEND_API_KEY");
  const from = getEnv(env, "REPORT_EMAIL_FROM");
  const to = getEnv(env, "REPORT_EMAIL_TO")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  const missing = [
    apiKey ? null : "RESEND_API_KEY",
    from ? null : "REPORT_EMAIL_FROM",
    to.length > 0 ? null : "REPORT_EMAIL_TO"
  ].filter((name): name is string => name !== null);

  if (missing.length > 0) {
    throw new DeliveryError(`[market:email] Missing ${missing.join(", ")}`);
  }

  return { apiKey, from, to };
}

export class ResendEmailDelivery implements ReportDelivery {
  readonly #settings: EmailSettings;
  readonly #fetch: FetchLike;

  constructor(settings: EmailSettings, fetchImpl: FetchLike = fetch) {
    this.#settings = settings;
    this.#fetch = fetchImpl;
  }

  async send(document: ReportDocument): Promise<void> {
    let response: Response;
    try {
      response = await this.#fetch(RESEND_ENDPOINT, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.#settings.apiKey}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          from: this.#settings.from,
          to: this.#settings.to,
          subject: document.subject,
          html: document.html
        })
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DeliveryError(`[market:email] Send failed: ${message}`);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new DeliveryError(`[market:email] Send failed: HTTP ${response.status} ${text.slice(0, 200)}`, response.status);
    }

    console.log(`[market:email] sent "${document.subject}" to ${this.#settings.to.length} recipient(s)`);
  }
}
