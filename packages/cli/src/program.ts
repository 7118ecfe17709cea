/**
 * AnnoStore CLI commands
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { IndexNotFoundError, logger as storeLogger, type Role } from "@annostore/sdk";
import { withCliStore, type CliSession } from "./lib/store.js";
import { isVerbose, resolveCliSettings, type GlobalOptions } from "./lib/env.js";
import { parseJson, parseNonNegativeInt, parseRole, requireJsonObject } from "./lib/arg.js";
import { processIo, readJsonFromFile, type CliIo } from "./lib/io.js";
import { colorize, printJson, printLines } from "./lib/render.js";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { withTiming, type Telemetry } from "./lib/telemetry.js";

type JsonSourceOptions = {
  file?: string;
  data?: string;
};

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

/**
 * Read a JSON payload from --file, --data or stdin
 */
async function readJsonInput(options: JsonSourceOptions, io: CliIo): Promise<unknown> {
  if (options.file !== undefined && options.data !== undefined) {
    throw new CliError("Cannot use both --file and --data; choose one or use stdin");
  }
  if (options.file !== undefined) {
    return readJsonFromFile(options.file);
  }
  if (options.data !== undefined) {
    return parseJson(options.data, "--data");
  }

  if (io.isStdinTTY()) {
    throw new CliError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }
  let stdin: string;
  try {
    stdin = await io.readStdin();
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : "Failed to read from stdin", { cause: err });
  }
  if (!stdin.trim()) {
    throw new CliError("stdin is empty");
  }
  return parseJson(stdin, "stdin");
}

/**
 * Build the command tree; output goes through `io`
 */
export function buildProgram(io: CliIo, env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  // Settings set here are inherited by every subcommand created below
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(colorize(str, "red", io.isStderrTTY())),
    })
    .exitOverride();

  program
    .name("annostore")
    .description("AnnoStore - multi-tenant W3C annotation store with paged searches and background indexes")
    .version(readVersion())
    .option("--root <path>", "Data directory root (env: ANNOSTORE_ROOT)")
    .option("--user <name>", "Act as a registered user instead of the superuser (env: ANNOSTORE_USER)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const run = <T>(label: string, fn: (session: CliSession) => Promise<T>): Promise<T> => {
    const { root, user, baseUrl, verbose } = resolveCliSettings(globals(), env);
    const telemetry: Telemetry = { verbose, write: (text) => io.stderr(text) };
    return withTiming(telemetry, label, () => withCliStore({ root, user, baseUrl }, fn));
  };

  const say = (line: string): void => {
    if (!globals().quiet) {
      io.stdout(`${line}\n`);
    }
  };

  // Containers

  const container = program.command("container").description("Create, show and remove annotation containers");

  container
    .command("create [name]")
    .description("Create a container; a taken or missing name gets a generated one")
    .option("--label <label>", "Human-readable label (defaults to the name)")
    .option("--anonymous-read", "Let unauthenticated callers search and read")
    .action(async (name: string | undefined, options: { label?: string; anonymousRead?: boolean }) => {
      await run("cli.container.create", async ({ store, principal }) => {
        const info = await store.createContainer(principal, {
          name,
          label: options.label,
          readOnlyForAnonymousUsers: options.anonymousRead ?? false,
        });
        printJson(io, info);
      });
    });

  container
    .command("show <name>")
    .description("Describe a container")
    .option("--fields", "Include field occurrence counts")
    .action(async (name: string, options: { fields?: boolean }) => {
      await run("cli.container.show", async ({ store, principal }) => {
        const info = await store.getContainer(principal, name);
        if (options.fields) {
          printJson(io, { ...info, fieldCounts: await store.getFieldCounts(principal, name) });
        } else {
          printJson(io, info);
        }
      });
    });

  container
    .command("list")
    .description("List the containers you hold a role in, grouped by role")
    .action(async () => {
      await run("cli.container.list", async ({ store, principal }) => {
        printJson(io, await store.getMyContainers(principal));
      });
    });

  container
    .command("rm <name>")
    .description("Remove a container")
    .option("--force", "Remove even when it still holds annotations")
    .action(async (name: string, options: { force?: boolean }) => {
      await run("cli.container.rm", async ({ store, principal }) => {
        await store.deleteContainer(principal, name, { force: Boolean(options.force) });
        say(`Removed container ${name}`);
      });
    });

  // Annotations

  const annotation = program.command("annotation").description("Add, show and remove annotations");

  annotation
    .command("add <container>")
    .description("Store an annotation read from --file, --data or stdin")
    .option("--name <name>", "Preferred annotation name")
    .option("--file <path>", "Read annotation from JSON file")
    .option("--data <json>", "Inline JSON annotation")
    .action(async (containerName: string, options: JsonSourceOptions & { name?: string }) => {
      const body = await readJsonInput(options, io);
      await run("cli.annotation.add", async ({ store, principal }) => {
        printJson(io, await store.addAnnotation(principal, containerName, body, { name: options.name }));
      });
    });

  annotation
    .command("get <container> <name>")
    .description("Show an annotation with its etag and timestamps")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (containerName: string, name: string, options: { raw?: boolean }) => {
      await run("cli.annotation.get", async ({ store, principal }) => {
        printJson(io, await store.getAnnotation(principal, containerName, name), { raw: options.raw });
      });
    });

  annotation
    .command("rm <container> <name>")
    .description("Remove an annotation")
    .option("--etag <etag>", "Only remove while the annotation still carries this etag")
    .action(async (containerName: string, name: string, options: { etag?: string }) => {
      await run("cli.annotation.rm", async ({ store, principal }) => {
        await store.deleteAnnotation(principal, containerName, name, options.etag);
        say(`Removed ${containerName}/${name}`);
      });
    });

  // Search

  program
    .command("search <container>")
    .description("Search a container with a query read from --file, --data or stdin")
    .option("--file <path>", "Read query from JSON file")
    .option("--data <json>", "Inline JSON query")
    .option("--page <n>", "Result page to show", (val) => parseNonNegativeInt(val, "--page"))
    .option("--info", "Show the search id and hit count instead of a page")
    .action(async (containerName: string, options: JsonSourceOptions & { page?: number; info?: boolean }) => {
      const query = requireJsonObject(await readJsonInput(options, io), "Query");
      await run("cli.search", async ({ store, principal }) => {
        const search = await store.createSearch(principal, containerName, query);
        if (options.info) {
          printJson(io, search);
          return;
        }
        printJson(io, await store.getSearchPage(principal, containerName, search.id, options.page ?? 0));
      });
    });

  // Indexes

  const index = program.command("index").description("Build, inspect and drop indexes");

  index
    .command("add <container> <field> <type>")
    .description("Build an index (hashed, ascending, descending or text)")
    .action(async (containerName: string, field: string, type: string) => {
      await run("cli.index.add", async ({ store, principal }) => {
        await store.addIndex(principal, containerName, field, type);
        await store.close();
        printJson(io, await store.getIndexStatus(principal, containerName, field, type));
      });
    });

  index
    .command("status <container> <field> <type>")
    .description("Show an index; builds are not remembered between runs")
    .action(async (containerName: string, field: string, type: string) => {
      await run("cli.index.status", async ({ store, principal }) => {
        try {
          printJson(io, await store.getIndexStatus(principal, containerName, field, type));
        } catch (err) {
          if (!(err instanceof IndexNotFoundError)) {
            throw err;
          }
          printJson(io, await store.getIndex(principal, containerName, field, type));
        }
      });
    });

  index
    .command("list <container>")
    .description("List the indexes of a container")
    .option("--json", "Output as JSON array")
    .action(async (containerName: string, options: { json?: boolean }) => {
      await run("cli.index.list", async ({ store, principal }) => {
        const indexes = await store.listIndexes(principal, containerName);
        if (options.json) {
          printJson(io, indexes);
        } else {
          printLines(io, indexes.map((config) => `${config.field}\t${config.type}`));
        }
      });
    });

  index
    .command("rm <container> <field> <type>")
    .description("Drop an index")
    .action(async (containerName: string, field: string, type: string) => {
      await run("cli.index.rm", async ({ store, principal }) => {
        await store.deleteIndex(principal, containerName, field, type);
        say(`Removed ${type} index on ${containerName}.${field}`);
      });
    });

  // Users

  const user = program.command("user").description("Manage users (superuser only)");

  user
    .command("add <name>")
    .description("Register a user with an API key")
    .requiredOption("--key <apiKey>", "API key the user authenticates with")
    .action(async (name: string, options: { key: string }) => {
      await run("cli.user.add", async ({ store, principal }) => {
        const result = await store.addUsers(principal, [{ userName: name, apiKey: options.key }]);
        const rejected = result.rejected[0];
        if (rejected) {
          throw new CliError(`User '${rejected.userName}' not added: ${rejected.reason}`);
        }
        say(`Added user ${name}`);
      });
    });

  user
    .command("list")
    .description("List user names")
    .option("--json", "Output as JSON array")
    .action(async (options: { json?: boolean }) => {
      await run("cli.user.list", async ({ store, principal }) => {
        const users = await store.listUsers(principal);
        if (options.json) {
          printJson(io, users);
        } else {
          printLines(io, users);
        }
      });
    });

  user
    .command("rm <name>")
    .description("Remove a user and every role they hold")
    .action(async (name: string) => {
      await run("cli.user.rm", async ({ store, principal }) => {
        await store.deleteUser(principal, name);
        say(`Removed user ${name}`);
      });
    });

  // Roles

  const role = program.command("role").description("Manage container roles");

  role
    .command("set")
    .description("Give a user a role in a container")
    .argument("<container>")
    .argument("<user>")
    .argument("<role>", "ADMIN, EDITOR or GUEST", parseRole)
    .action(async (containerName: string, userName: string, roleName: Role) => {
      await run("cli.role.set", async ({ store, principal }) => {
        await store.addContainerUsers(principal, containerName, [{ userName, role: roleName }]);
        say(`${userName} is ${roleName} in ${containerName}`);
      });
    });

  role
    .command("rm <container> <user>")
    .description("Remove a user's role in a container")
    .action(async (containerName: string, userName: string) => {
      await run("cli.role.rm", async ({ store, principal }) => {
        await store.removeContainerUser(principal, containerName, userName);
        say(`Removed ${userName} from ${containerName}`);
      });
    });

  role
    .command("list <container>")
    .description("List the users of a container with their roles")
    .option("--json", "Output as JSON array")
    .action(async (containerName: string, options: { json?: boolean }) => {
      await run("cli.role.list", async ({ store, principal }) => {
        const users = await store.getContainerUsers(principal, containerName);
        if (options.json) {
          printJson(io, users);
        } else {
          printLines(io, users.map((entry) => `${entry.userName}\t${entry.role}`));
        }
      });
    });

  return program;
}

/**
 * Run the CLI and resolve to its exit code
 */
export async function runCli(
  argv: readonly string[],
  options: { io?: CliIo; env?: NodeJS.ProcessEnv } = {}
): Promise<number> {
  const io = options.io ?? processIo;
  const env = options.env ?? process.env;
  const verbose = argv.includes("--verbose") || isVerbose(env);

  // Store diagnostics never share stdout with command output
  storeLogger.setSink((line) => io.stderr(`${line}\n`));
  storeLogger.setEnabled(verbose);

  const program = buildProgram(io, env);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already printed its own usage errors and help
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    io.stderr(colorize(`Error: ${formatCliError(err, verbose)}\n`, "red", io.isStderrTTY()));
    return mapSdkErrorToExitCode(err);
  } finally {
    storeLogger.setEnabled(true);
    storeLogger.setSink();
  }
}
