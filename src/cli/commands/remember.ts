import type { Command } from "commander";
import { pathExists, readFile } from "fs-extra";
import { z } from "zod";
import { detectTags } from "../../services/auto-tag";
import { previewText } from "../../utils/text";
import { confirm } from "../confirm";
import { readGlobalOptions, withContainer, type CliEnvironment } from "../context";
import { UsageError } from "../errors";
import { formatTags, printJson, resolveOutputMode } from "../output";
import { collect, collectIntegers, parseInteger } from "../parsers";

const RememberOptionsSchema = z.object({
  tag: z.array(z.string()).default([]),
  context: z.string().optional(),
  source: z.string().default("user"),
  file: z.string().optional(),
  session: z.string().optional(),
  autoTag: z.boolean().default(false),
  suggestTags: z.boolean().default(false),
  supersedes: z.number().optional(),
  seeAlso: z.array(z.number()).default([]),
  sourceUrl: z.string().optional(),
  sourceFile: z.string().optional(),
  importance: z.number().default(3),
});

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

async function resolveContent(content: string | undefined, file: string | undefined): Promise<string> {
  if (file) {
    if (!(await pathExists(file))) {
      throw new UsageError(`File not found: ${file}`);
    }
    return readFile(file, "utf-8");
  }

  if (content !== undefined) {
    return content;
  }

  if (!process.stdin.isTTY) {
    const piped = (await readStdin()).trim();
    if (piped) {
      return piped;
    }
  }

  throw new UsageError("No content provided");
}

export function registerRememberCommand(program: Command, environment: CliEnvironment): void {
  program
    .command("remember")
    .description("Store a new memory")
    .argument("[content]", "Text to remember; omit to read from --file or stdin")
    .option("-t, --tag <tag>", "Tag for categorization (repeatable)", collect, [])
    .option("-c, --context <text>", "Why or where this was stored; searchable")
    .option("-s, --source <source>", "Who created it", "user")
    .option("-f, --file <path>", "Read content from a file")
    .option("--session <id>", "Session id for grouping related memories")
    .option("--auto-tag", "Add tags detected from content keywords")
    .option("--suggest-tags", "Show detected tags and ask before adding them")
    .option("--supersedes <id>", "Id of the memory this one replaces", parseInteger)
    .option("--see-also <id>", "Id of a related memory (repeatable)", collectIntegers, [])
    .option("--source-url <url>", "URL the information came from")
    .option("--source-file <path>", "File the information came from")
    .option("-i, --importance <level>", "Importance from 1 to 5", parseInteger, 3)
    .action(async (contentArg: string | undefined, rawOptions: unknown, command: Command) => {
      const options = RememberOptionsSchema.parse(rawOptions);
      const globals = readGlobalOptions(command);
      const mode = resolveOutputMode(globals);
      const content = await resolveContent(contentArg, options.file);

      let tags = options.tag;
      let autoTag = options.autoTag;
      if (options.suggestTags && mode !== "quiet") {
        const suggested = detectTags(content).filter((tag) => !tags.includes(tag));
        if (suggested.length > 0) {
          console.log(`Suggested tags: ${suggested.join(", ")}`);
          if (await confirm("Add them?")) {
            tags = [...tags, ...suggested];
          }
          autoTag = false;
        }
      }

      await withContainer(environment, globals, ({ services }) => {
        const { memory, autoTags } = services.memory.remember({
          content,
          tags,
          context: options.context,
          source: options.source,
          sessionId: options.session,
          supersedes: options.supersedes,
          seeAlso: options.seeAlso,
          sourceUrl: options.sourceUrl,
          sourceFile: options.sourceFile,
          importance: options.importance,
          autoTag,
        });

        if (mode === "quiet") {
          console.log(String(memory.id));
          return;
        }

        if (mode === "json") {
          printJson({
            id: memory.id,
            content: memory.content,
            tags: memory.tags,
            ...(autoTag ? { auto_tags: autoTags } : {}),
          });
          return;
        }

        const suffix = autoTags.length ? ` [auto-tagged: ${autoTags.join(", ")}]` : "";
        console.log(`Remembered (id=${memory.id})${suffix}`);

        const similar = services.memory.similarTo(memory);
        if (similar.length > 0) {
          console.log("Similar existing memories:");
          for (const { memory: match } of similar) {
            console.log(`  [${match.id}] ${previewText(match.content, 50)}${formatTags(match.tags)}`);
          }
        }
      });
    });
}
