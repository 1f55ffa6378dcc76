import type { Command } from "commander";
import { parseContentIdArg } from "../cli/args.js";
import { reportFailure, reportSuccess } from "../cli/report.js";
import { type ContentId, ZERO_HASH, formatContentId } from "../content/types.js";
import { getChildLogger } from "../logging.js";
import { type Platform, createPlatform } from "../platform/index.js";
import { formatTokenAmount } from "../utils.js";

const logger = getChildLogger({ module: "cmd-workflow" });

type CallerOptions = { as: string };

/**
 * Run one workflow as `--as <account>` and report the outcome.
 */
function runAs(command: string, body: (platform: Platform) => string): void {
	try {
		const { platform } = createPlatform();
		reportSuccess(body(platform));
	} catch (err) {
		reportFailure(logger, command, err);
	}
}

function withCaller(cmd: Command): Command {
	return cmd.requiredOption("--as <account>", "account performing the action");
}

export function registerWorkflowCommands(program: Command): void {
	withCaller(
		program
			.command("upload")
			.description("Publish content by its content and metadata hashes")
			.argument("<type>", "content type")
			.argument("<contentHash>", "0x-prefixed 32-byte content hash")
			.option("-m, --metadata <hash>", "0x-prefixed 32-byte metadata hash", ZERO_HASH),
	).action((type: string, contentHash: string, opts: CallerOptions & { metadata: string }) => {
		runAs("upload", (platform) => {
			const id = platform.upload(opts.as, contentHash, opts.metadata, type);
			return `uploaded ${formatContentId(id)}`;
		});
	});

	withCaller(
		program
			.command("like")
			.description("Like content (charges the current fee)")
			.argument("<id>", "content id as <type>:<index>", parseContentIdArg),
	).action((id: ContentId, opts: CallerOptions) => {
		runAs("like", (platform) => {
			platform.like(opts.as, id);
			return `liked ${formatContentId(id)}`;
		});
	});

	withCaller(
		program
			.command("dislike")
			.description("Dislike content (charges the current fee)")
			.argument("<id>", "content id as <type>:<index>", parseContentIdArg),
	).action((id: ContentId, opts: CallerOptions) => {
		runAs("dislike", (platform) => {
			platform.dislike(opts.as, id);
			return `disliked ${formatContentId(id)}`;
		});
	});

	withCaller(
		program
			.command("harvest")
			.description("Mint rewards for unharvested net likes to the content owner")
			.argument("<id>", "content id as <type>:<index>", parseContentIdArg),
	).action((id: ContentId, opts: CallerOptions) => {
		runAs("harvest", (platform) => {
			const amount = platform.harvestLikes(opts.as, id);
			return `harvested ${formatTokenAmount(amount)} for ${formatContentId(id)}`;
		});
	});

	withCaller(
		program
			.command("delete")
			.description("Remove crowd-disapproved content and strike its owner")
			.argument("<id>", "content id as <type>:<index>", parseContentIdArg),
	).action((id: ContentId, opts: CallerOptions) => {
		runAs("delete", (platform) => {
			platform.deletion(opts.as, id);
			return `deleted ${formatContentId(id)}`;
		});
	});

	withCaller(
		program
			.command("retract")
			.description("Delete your own content without a strike")
			.argument("<id>", "content id as <type>:<index>", parseContentIdArg),
	).action((id: ContentId, opts: CallerOptions) => {
		runAs("retract", (platform) => {
			platform.voluntarilyDelete(opts.as, id);
			return `retracted ${formatContentId(id)}`;
		});
	});

	withCaller(
		program
			.command("reply")
			.description("Mark your content as a reply to another record")
			.argument("<replyId>", "your content as <type>:<index>", parseContentIdArg)
			.argument("<targetId>", "replied-to content as <type>:<index>", parseContentIdArg),
	).action((replyId: ContentId, targetId: ContentId, opts: CallerOptions) => {
		runAs("reply", (platform) => {
			platform.reply(opts.as, replyId, targetId);
			return `${formatContentId(replyId)} now replies to ${formatContentId(targetId)}`;
		});
	});

	withCaller(
		program
			.command("register")
			.description("Claim a username (permanent)")
			.argument("<name>", "4-15 characters of a-z, 0-9 and _")
			.option("-m, --metadata <hash>", "0x-prefixed 32-byte profile metadata hash", ZERO_HASH),
	).action((name: string, opts: CallerOptions & { metadata: string }) => {
		runAs("register", (platform) => {
			const userName = platform.createUser(opts.as, name, opts.metadata);
			return `registered ${userName} for ${opts.as}`;
		});
	});

	withCaller(
		program
			.command("set-metadata")
			.description("Replace your profile metadata hash (zero hash clears it)")
			.argument("<hash>", "0x-prefixed 32-byte metadata hash"),
	).action((hash: string, opts: CallerOptions) => {
		runAs("set-metadata", (platform) => {
			platform.updateMetadata(opts.as, hash);
			return `metadata updated for ${opts.as}`;
		});
	});

	withCaller(
		program.command("withdraw").description("Transfer collected fees to the administrator"),
	).action((opts: CallerOptions) => {
		runAs("withdraw", (platform) => {
			const amount = platform.withdraw(opts.as);
			return `withdrew ${formatTokenAmount(amount)} to ${opts.as}`;
		});
	});
}
