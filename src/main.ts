#!/usr/bin/env node
import fs from "fs";
import { type Command, type GlobalOptions, UsageError, parseCli, usage } from "./cli_args.js";
import { type LabelConfig, configSearchPaths, loadConfigOrDefault, userConfigPath } from "./config_load.js";
import { exampleConfig, generateConfig } from "./config_generate.js";
import { UsbbwError, describeError } from "./errors.js";
import { graphToGraphml } from "./graphml_export.js";
import { writeProductLabel } from "./label_write.js";
import { layoutGraph } from "./layout.js";
import { generateHtml, generateMarkdown, generateMermaid } from "./mermaid.js";
import { RefreshLoop, type Snapshot, createSession, refreshOnce } from "./refresh.js";
import { renderDeviceList, renderChanges, renderRecommendations, renderSummary } from "./report.js";
import { defaultCssPath, renderSvg } from "./render_svg.js";
import { SYSFS_USB_DEVICES, readSysfs } from "./sysfs_read.js";
import { topologyGraph } from "./topology_graph.js";
import { writeText } from "./util.js";

function warn(warnings: UsbbwError[]): void {
  for (const w of warnings) console.error(`warning: ${describeError(w)}`);
}

function emit(content: string, output?: string): void {
  if (output) writeText(output, content);
  else process.stdout.write(content);
}

function snapshotOnce(global: GlobalOptions, config: LabelConfig): Snapshot {
  const base = global.sysfs ?? SYSFS_USB_DEVICES;
  const { snapshot } = refreshOnce(createSession(), { readSource: () => readSysfs(base), config });
  warn(snapshot.warnings);
  return snapshot;
}

async function watch(global: GlobalOptions, config: LabelConfig, cmd: Extract<Command, { name: "watch" }>): Promise<void> {
  const base = global.sysfs ?? SYSFS_USB_DEVICES;
  const useBits = config.settings.use_bits;
  let seen = 0;
  const loop = new RefreshLoop(
    { readSource: () => readSysfs(base), config },
    cmd.intervalMs ?? config.settings.refresh_ms,
    (s) => {
      seen += 1;
      if (seen === 1) {
        warn(s.warnings);
        process.stdout.write(renderSummary(s.annotated, { useBits }));
      } else {
        const stamp = new Date().toISOString();
        for (const line of renderChanges(s.annotated, s.diff.removed)) process.stdout.write(`${stamp} ${line}\n`);
      }
      if (cmd.count !== undefined && seen >= cmd.count) loop.stop();
    },
    (e) => console.error(`error: ${describeError(e)}`),
  );
  const onSignal = (): void => loop.stop();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  try {
    await loop.start();
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  }
}

async function main() {
  const { global, command: cmd } = parseCli(process.argv.slice(2));
  if (cmd.name === "help") {
    process.stdout.write(usage);
    return;
  }
  if (cmd.name === "init-config") {
    process.stdout.write(exampleConfig());
    return;
  }
  if (cmd.name === "set-label") {
    const file = global.config ?? userConfigPath();
    writeProductLabel(file, cmd.configKey, cmd.label);
    console.error(`label for ${cmd.configKey} written to ${file}`);
    return;
  }

  const { config } = loadConfigOrDefault(global.config);
  const useBits = config.settings.use_bits;

  switch (cmd.name) {
    case "summary":
      process.stdout.write(renderSummary(snapshotOnce(global, config).annotated, { useBits }));
      break;
    case "list":
      process.stdout.write(renderDeviceList(snapshotOnce(global, config).annotated, { ...cmd, useBits }));
      break;
    case "recommend":
      process.stdout.write(renderRecommendations(snapshotOnce(global, config).annotated, cmd.requiredBps, { speed: cmd.speed, useBits }));
      break;
    case "mermaid": {
      const a = snapshotOnce(global, config).annotated;
      const content = cmd.html ? generateHtml(a, config) : cmd.markdown ? generateMarkdown(a, config) : generateMermaid(a, config);
      emit(content, cmd.output);
      break;
    }
    case "graphml":
      emit(graphToGraphml(topologyGraph(snapshotOnce(global, config).annotated, { useBits })), cmd.output);
      break;
    case "diagram": {
      const g = await layoutGraph(topologyGraph(snapshotOnce(global, config).annotated, { useBits }));
      fs.writeFileSync(cmd.svg, renderSvg(g, { cssPath: defaultCssPath, title: "USB Topology" }), "utf8");
      if (cmd.json) fs.writeFileSync(cmd.json, JSON.stringify(g, null, 2), "utf8");
      break;
    }
    case "generate-config": {
      emit(generateConfig(snapshotOnce(global, config).topology), cmd.output);
      if (cmd.output) {
        console.error(`config written to ${cmd.output}; copy it to one of:`);
        for (const p of configSearchPaths()) console.error(`  ${p}`);
      }
      break;
    }
    case "watch":
      await watch(global, config, cmd);
      break;
  }
}

main().catch((e) => {
  if (e instanceof UsageError) {
    console.error(`error: ${e.message}\n\n${usage}`);
  } else {
    console.error(`error: ${describeError(e)}`);
  }
  process.exit(1);
});
