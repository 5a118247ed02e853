import { format } from "date-fns";
import { createJiraClient } from "./api/jira";
import { trustCaBundle } from "./api/http";
import { createTempoClient } from "./api/tempo";
import { type AppConfig, loadConfigFromEnvironment } from "./config";
import { writeReport } from "./export/workbook";
import type { RawWorklogEvent } from "./types";
import { ConfigError, showProgress, showSuccess } from "./utils/error-handling";
import { formatHours, lookbackWindow } from "./utils/time-formatting";
import { getDaysBackError, getProjectKeyError } from "./utils/validation";
import { runUtilisationPipeline } from "./utilisation/pipeline";
import { resolveProjectId } from "./utilisation/resolve";
import { readWebhookEvents } from "./utilisation/webhook";

export const USAGE = `Usage:
  tempo-utilisation <project_key> [days_back]
  tempo-utilisation webhook <events_file>
  tempo-utilisation accounts`;

export type Command =
  | { name: "bulk"; projectKey: string; daysBack: number | null }
  | { name: "webhook"; eventsFile: string }
  | { name: "accounts" };

export function parseArgs(argv: string[]): Command {
  const [first, second, ...rest] = argv;

  if (first === "accounts") {
    if (argv.length > 1) throw new ConfigError(`accounts mode takes no arguments\n${USAGE}`);
    return { name: "accounts" };
  }

  if (first === "webhook") {
    if (!second || rest.length > 0) throw new ConfigError(`webhook mode needs exactly one events file\n${USAGE}`);
    return { name: "webhook", eventsFile: second };
  }

  if (!first || rest.length > 0) throw new ConfigError(USAGE);

  const keyError = getProjectKeyError(first);
  if (keyError) throw new ConfigError(`${keyError}\n${USAGE}`);

  let daysBack: number | null = null;
  if (second !== undefined) {
    const daysError = getDaysBackError(second);
    if (daysError) throw new ConfigError(`${daysError}\n${USAGE}`);
    daysBack = Number(second);
  }

  return { name: "bulk", projectKey: first.trim().toUpperCase(), daysBack };
}

/** CLI argument first, then UTILISATION_DAYS_BACK; there is no built-in default. */
export function resolveDaysBack(command: { daysBack: number | null }, config: AppConfig): number {
  const daysBack = command.daysBack ?? config.daysBack;
  if (daysBack === null) {
    throw new ConfigError("No lookback window: pass days_back or set UTILISATION_DAYS_BACK");
  }
  return daysBack;
}

async function report(config: AppConfig, events: RawWorklogEvent[], baseName: string): Promise<void> {
  const jira = createJiraClient(config);
  const { records, rows } = await runUtilisationPipeline(events, { jira, userCacheSize: config.userCacheSize });

  const totalHours = records.reduce((sum, record) => sum + (record.hours ?? 0), 0);
  showSuccess("Report", `Aggregated ${records.length} worklogs into ${rows.length} utilisation rows`, formatHours(totalHours));

  const files = writeReport(config.outputDir, baseName, rows, records);
  showSuccess("Report", "Written", `${files.workbook}, ${files.snapshot}`);
}

export async function run(argv: string[]): Promise<void> {
  const command = parseArgs(argv);
  const config = loadConfigFromEnvironment();
  if (config.caBundlePath) trustCaBundle(config.caBundlePath);

  switch (command.name) {
    case "bulk": {
      const daysBack = resolveDaysBack(command, config);
      const projectId = await resolveProjectId(createJiraClient(config), command.projectKey);
      const { from, to } = lookbackWindow(daysBack);

      showProgress("Tempo API", `Pulling worklogs for ${command.projectKey}`, `${from} → ${to}`);
      const events = await createTempoClient(config).getProjectWorklogs(projectId, from, to);
      showSuccess("Tempo API", `Pulled ${events.length} worklogs for ${command.projectKey}`, `${from} → ${to}`);

      await report(config, events, `${command.projectKey}_${to}`);
      return;
    }
    case "webhook": {
      const events = await readWebhookEvents(command.eventsFile);
      showSuccess("Webhook", `Read ${events.length} webhook events`, command.eventsFile);
      await report(config, events, `webhook_${format(new Date(), "yyyy-MM-dd")}`);
      return;
    }
    case "accounts": {
      const accounts = await createTempoClient(config).getAccounts();
      showSuccess("Tempo API", `Pulled ${accounts.length} accounts`);
      for (const account of accounts) console.log(`${account.key}\t${account.name}`);
      return;
    }
  }
}
