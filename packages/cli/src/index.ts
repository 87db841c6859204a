#!/usr/bin/env node

import { stringifyJson } from "@trustledger/core-runtime";
import { startLocalApi } from "@trustledger/local-api";
import { getOption, openLedger, runCommand } from "./commands.js";

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv;

  if (command === "serve") {
    await handleServe(rest);
    return;
  }

  const output = await runCommand(process.argv.slice(2), { env: process.env });
  console.log(typeof output === "string" ? output : stringifyJson(output, 2));
}

async function handleServe(args: string[]): Promise<void> {
  const { ledger, replay } = await openLedger(process.env);
  const portOption = getOption(args, "--port");
  const port = portOption === undefined ? ledger.config.localApiPort : Number(portOption);
  const api = await startLocalApi({ ledger, port });

  if (ledger.config.debug) {
    ledger.subscribe((receipt) => console.log(`#${receipt.seq} ${receipt.method} by ${receipt.caller}`));
  }
  console.log(stringifyJson({ ok: true, command: "serve", port, replay, status: ledger.status() }, 2));

  const shutdown = (): void => {
    api
      .stop()
      .then(() => ledger.close())
      .catch((error: unknown) => {
        console.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
