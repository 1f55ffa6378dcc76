import type { Command } from "commander";
import { parseContentIdArg, parsePositiveIntArg, toDisplayJson } from "../cli/args.js";
import { reportFailure } from "../cli/report.js";
import { type ContentId, formatContentId } from "../content/types.js";
import { getChildLogger } from "../logging.js";
import type { PlatformEventKind } from "../platform/events.js";
import { createPlatform } from "../platform/index.js";

const logger = getChildLogger({ module: "cmd-inspect" });

const EVENT_KINDS: readonly PlatformEventKind[] = [
	"Uploaded",
	"Liked",
	"Disliked",
	"Harvested",
	"Deleted",
	"Replied",
];

function isEventKind(value: string): value is PlatformEventKind {
	return EVENT_KINDS.some((kind) => kind === value);
}

export function registerInspectCommands(program: Command): void {
	program
		.command("content")
		.description("Show a content record and its reply edges")
		.argument("<id>", "content id as <type>:<index>", parseContentIdArg)
		.action((id: ContentId) => {
			try {
				const { platform } = createPlatform();
				const record = platform.getContentById(id);
				console.log(
					toDisplayJson({
						id: formatContentId(id),
						...record,
						repliesTo: record.repliesTo.map(formatContentId),
						repliedBy: record.repliedBy.map(formatContentId),
					}),
				);
			} catch (err) {
				reportFailure(logger, "content", err);
			}
		});

	program
		.command("profile")
		.description("Show an account's profile")
		.argument("<account>", "account identifier")
		.action((account: string) => {
			try {
				const { platform, token } = createPlatform();
				console.log(
					toDisplayJson({
						account,
						...platform.getProfile(account),
						balance: token.balanceOf(account),
						allowance: token.allowance(account, token.platformAccount),
					}),
				);
			} catch (err) {
				reportFailure(logger, "profile", err);
			}
		});

	program
		.command("whois")
		.description("Show the account that owns a username")
		.argument("<name>", "username")
		.action((name: string) => {
			try {
				const { platform } = createPlatform();
				console.log(platform.getUsernameOwner(name) ?? "(unregistered)");
			} catch (err) {
				reportFailure(logger, "whois", err);
			}
		});

	program
		.command("mau")
		.description("Show the monthly active user histogram")
		.action(() => {
			try {
				const { platform } = createPlatform();
				const history = platform.mauHistory();
				history.forEach((count, period) => {
					console.log(`period ${period}: ${count}`);
				});
				console.log(`pricing MAU: ${platform.currentPeriodMAU()}`);
			} catch (err) {
				reportFailure(logger, "mau", err);
			}
		});

	program
		.command("events")
		.description("List recent platform events, newest first")
		.option("-n, --limit <count>", "number of events", parsePositiveIntArg, 20)
		.option("-k, --kind <kind>", `only events of one kind (${EVENT_KINDS.join(", ")})`)
		.action((opts: { limit: number; kind?: string }) => {
			try {
				if (opts.kind !== undefined && !isEventKind(opts.kind)) {
					throw new Error(`unknown event kind "${opts.kind}"`);
				}
				const { platform } = createPlatform();
				const events = platform.listEvents({ limit: opts.limit, kind: opts.kind });
				for (const stored of events) {
					const at = new Date(stored.emittedAt).toISOString();
					console.log(`#${stored.id} ${at} ${toDisplayJson(stored.event).replace(/\s+/g, " ")}`);
				}
			} catch (err) {
				reportFailure(logger, "events", err);
			}
		});
}
