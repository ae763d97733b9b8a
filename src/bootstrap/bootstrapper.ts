import { join } from "node:path";
import { isMap, isScalar, isSeq, parseDocument } from "yaml";
import type { RunConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { dartBinary, flutterBinary } from "../sdk/path.js";
import type { SystemPort } from "../system.js";
import * as templates from "./templates.js";

export type BootstrapConfig = Pick<
  RunConfig,
  "projectName" | "projectPath" | "packageName" | "template" | "channel"
>;

export interface BootstrapDeps {
  sdkRoot: string;
  system: SystemPort;
  logger: Logger;
}

/** Project-relative path → contents of every file the bootstrapper owns. */
export function scaffoldFiles(config: BootstrapConfig): Record<string, string> {
  const { packageName, template } = config;
  return {
    ".vscode/settings.json": templates.vscodeSettings(),
    ".vscode/launch.json": templates.vscodeLaunch(),
    Makefile: templates.makefile(),
    "test/unit/sanity_test.dart": templates.unitTest(),
    "test/widget/app_widget_test.dart": templates.widgetTest(packageName, template),
    "integration_test/app_test.dart": templates.integrationTest(packageName, template),
    "analysis_options.yaml": templates.analysisOptions(),
    ".github/workflows/flutter-ci.yml": templates.ciWorkflow(config.channel),
    ".env": templates.envFile(),
    "README.md": templates.readme(config.projectName),
  };
}

/**
 * Add the dotenv import and an async `main` that loads `.env`. Returns
 * undefined when the source is already patched or has no `void main() {`.
 */
export function patchMainDart(source: string): string | undefined {
  if (source.includes(templates.DOTENV_MARKER)) return undefined;
  if (!source.includes(templates.MAIN_SIGNATURE)) return undefined;

  const lines = source.split("\n");
  const flutterImport = lines.findIndex(
    (line) => line.trim().startsWith("import ") && line.includes("package:flutter")
  );
  lines.splice(flutterImport >= 0 ? flutterImport + 1 : 0, 0, templates.DOTENV_IMPORT);

  return lines
    .join("\n")
    .replace(templates.MAIN_SIGNATURE, templates.ASYNC_MAIN);
}

/**
 * Make sure `.env` is listed under `flutter.assets` so `dotenv.load` can
 * find it in the bundle. Returns undefined when nothing needs to change.
 */
export function registerEnvAsset(pubspec: string): string | undefined {
  const doc = parseDocument(pubspec);
  const flutter = doc.get("flutter");

  if (flutter === undefined || flutter === null) {
    doc.set("flutter", doc.createNode({ assets: [".env"] }));
    return doc.toString();
  }
  if (!isMap(flutter)) return undefined;

  const assets = flutter.get("assets");
  if (isSeq(assets)) {
    const listed = assets.items.some(
      (item) => (isScalar(item) ? item.value : item) === ".env"
    );
    if (listed) return undefined;
    assets.add(doc.createNode(".env"));
  } else if (assets === undefined || assets === null) {
    flutter.set("assets", doc.createNode([".env"]));
  } else {
    return undefined;
  }
  return doc.toString();
}

async function writeScaffold(config: BootstrapConfig, deps: BootstrapDeps): Promise<void> {
  const { system, logger } = deps;
  for (const [relativePath, content] of Object.entries(scaffoldFiles(config))) {
    await system.writeFile(join(config.projectPath, relativePath), content);
    logger.debug(`wrote ${relativePath}`);
  }
  logger.success("Editor config, Makefile, tests, lints, CI, .env and README written");
}

async function addDependencies(config: BootstrapConfig, deps: BootstrapDeps): Promise<void> {
  const { system, logger } = deps;
  const flutter = flutterBinary(deps.sdkRoot);
  const commands = [
    ["pub", "add", "flutter_dotenv"],
    ["pub", "add", "dev:flutter_lints", 'dev:integration_test:{"sdk":"flutter"}'],
  ];
  for (const args of commands) {
    try {
      await system.exec(flutter, args, { cwd: config.projectPath });
    } catch (err: unknown) {
      logger.warning(`Dependency addition warning: ${errorMessage(err)}`);
    }
  }
}

async function patchEntryPoint(config: BootstrapConfig, deps: BootstrapDeps): Promise<void> {
  const { system, logger } = deps;
  const mainPath = join(config.projectPath, "lib", "main.dart");
  const source = await system.readFile(mainPath);
  if (source === undefined) {
    logger.debug("lib/main.dart not found; skipping .env loading patch");
    return;
  }
  if (source.includes(templates.DOTENV_MARKER)) {
    logger.debug("lib/main.dart already loads .env");
    return;
  }
  const patched = patchMainDart(source);
  if (patched === undefined) {
    logger.warning(
      `lib/main.dart has no '${templates.MAIN_SIGNATURE}'; add dotenv.load(fileName: ".env") yourself.`
    );
    return;
  }
  await system.writeFile(mainPath, patched);
  logger.success("lib/main.dart loads .env at startup");
}

async function registerAsset(config: BootstrapConfig, deps: BootstrapDeps): Promise<void> {
  const { system, logger } = deps;
  const pubspecPath = join(config.projectPath, "pubspec.yaml");
  const pubspec = await system.readFile(pubspecPath);
  if (pubspec === undefined) {
    logger.debug("pubspec.yaml not found; skipping asset registration");
    return;
  }
  const updated = registerEnvAsset(pubspec);
  if (updated !== undefined) {
    await system.writeFile(pubspecPath, updated);
    logger.success("Registered .env as a Flutter asset");
  }
}

async function formatSources(config: BootstrapConfig, deps: BootstrapDeps): Promise<void> {
  try {
    await deps.system.exec(dartBinary(deps.sdkRoot), ["format", "."], {
      cwd: config.projectPath,
    });
  } catch (err: unknown) {
    deps.logger.warning(`Code formatting warning: ${errorMessage(err)}`);
  }
}

/** Lay the development tooling over a generated project; safe to run repeatedly. */
export async function bootstrapProject(
  config: BootstrapConfig,
  deps: BootstrapDeps
): Promise<void> {
  await writeScaffold(config, deps);
  await addDependencies(config, deps);
  await registerAsset(config, deps);
  await patchEntryPoint(config, deps);
  await formatSources(config, deps);
}
