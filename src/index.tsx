#!/usr/bin/env node
import React, { useCallback, useMemo, useState } from "react";
import { render } from "ink";
import { ReviewListScreen, ReviewScreen } from "./App.js";
import { HELP, parseArgs, VERSION, type ParsedArgs } from "./cli.js";
import { configPath, loadConfig, writeDefaultConfig } from "./config.js";
import { GithubReviewSource } from "./gh.js";
import { errorMessage, initializeLogging, log, shutdownLogging } from "./logging.js";
import { describeFilter } from "./model.js";
import { ReviewPipeline } from "./pipeline.js";
import type { AppConfig, CliOptions } from "./types.js";

const CLEAR_TERMINAL = "\u001B[2J\u001B[3J\u001B[H";

type Screen = "review-list" | "review";

function Root({
  config,
  pipeline,
  initialScreen,
  onExitRequest
}: {
  config: AppConfig;
  pipeline: ReviewPipeline;
  initialScreen: Screen;
  onExitRequest: () => void;
}): JSX.Element {
  const [screen, setScreen] = useState<Screen>(initialScreen);
  const filter = config.filter;
  const listOptions = useMemo(
    () => ({ circular: config.circular, truncate: config.truncate }),
    [config.circular, config.truncate]
  );

  const openSummaries = useCallback(() => pipeline.start(filter), [filter, pipeline]);
  const openDetails = useCallback(() => pipeline.startDetails(filter), [filter, pipeline]);

  const goTo = useCallback((next: Screen): void => {
    log.info("goto page", { page: next });
    setScreen(next);
  }, []);

  if (screen === "review") {
    return (
      <ReviewScreen
        open={openDetails}
        listOptions={listOptions}
        onBack={() => goTo("review-list")}
        onExitRequest={onExitRequest}
      />
    );
  }

  return (
    <ReviewListScreen
      open={openSummaries}
      filterLabel={describeFilter(filter)}
      listOptions={listOptions}
      onBeginReview={() => goTo("review")}
      onExitRequest={onExitRequest}
    />
  );
}

function fail(message: string, showHelp: boolean): never {
  console.error(message);
  if (showHelp) {
    console.error("");
    console.error(HELP);
  }
  process.exit(1);
}

function runInit(): void {
  const path = configPath();
  if (writeDefaultConfig(path)) {
    console.log(`Wrote default config to ${path}`);
  } else {
    console.log(`Config already exists at ${path}`);
  }
}

function runReview(options: CliOptions): void {
  let config: AppConfig;
  try {
    config = loadConfig(options);
  } catch (error) {
    fail(errorMessage(error), false);
  }

  const logPath = initializeLogging();
  log.info("starting tui", { log: logPath, query: describeFilter(config.filter) });

  const source = new GithubReviewSource({ pageSize: config.pageSize, token: config.githubToken });
  const pipeline = new ReviewPipeline(source, {
    summaries: { hardCap: config.hardCap },
    details: { hardCap: config.hardCap }
  });

  let app: ReturnType<typeof render> | undefined;
  let exiting = false;
  const requestExit = (): void => {
    if (exiting) {
      return;
    }

    exiting = true;
    app?.unmount();
    if (process.stdout.isTTY) {
      process.stdout.write(CLEAR_TERMINAL);
    }
  };

  const crash = (error: unknown): void => {
    log.error("unexpected error", { error: errorMessage(error) });
    requestExit();
    shutdownLogging();
    console.error(`rev crashed: ${errorMessage(error)}`);
    console.error(`See ${logPath} for details.`);
    process.exit(1);
  };

  process.on("uncaughtException", crash);
  process.on("unhandledRejection", crash);

  app = render(
    <Root
      config={config}
      pipeline={pipeline}
      initialScreen={options.details ? "review" : "review-list"}
      onExitRequest={requestExit}
    />,
    { exitOnCtrlC: false }
  );

  const handleSigint = (): void => {
    requestExit();
  };

  process.on("SIGINT", handleSigint);
  void app.waitUntilExit().finally(() => {
    process.off("SIGINT", handleSigint);
    log.info("stopping tui");
    shutdownLogging();
  });
}

function main(): void {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (error) {
    fail(errorMessage(error), true);
  }

  if (parsed.kind === "help") {
    console.log(HELP);
    return;
  }

  if (parsed.kind === "version") {
    console.log(VERSION);
    return;
  }

  if (parsed.options.command === "init") {
    runInit();
    return;
  }

  runReview(parsed.options);
}

main();
