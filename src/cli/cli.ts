#!/usr/bin/env node

async function main() {
  const command = process.argv[2];
  const args = process.argv.slice(3);

  if (command === "setup") {
    if (args.includes("--non-interactive")) {
      const { runSetupNonInteractive } = await import("./setup-non-interactive.js");
      await runSetupNonInteractive();
    } else {
      const { runSetup } = await import("./setup.js");
      await runSetup();
    }
  } else if (command === "send") {
    const { runSend } = await import("./send.js");
    await runSend(args);
  } else if (command === "queue") {
    const { runQueue } = await import("./queue.js");
    await runQueue(args);
  } else if (command === "listen") {
    const { runListen } = await import("./listen.js");
    await runListen(args);
  } else {
    console.error("Notify CLI");
    console.error("");
    console.error("Usage:");
    console.error("  notify setup                           — Interactive configuration wizard");
    console.error("  notify setup --non-interactive         — Headless setup from env vars");
    console.error("  notify send <eventType> <title> [opts] — Send a notification");
    console.error("      --severity Info|Warning|High|Critical  --message <text>");
    console.error("      --source <name>  --app <slug>  --entity <id>");
    console.error("  notify queue list|count|clear|retry    — Inspect or drain the offline queue");
    console.error("  notify listen [--user <id>] [--app <id>] — Stream live notifications");
    process.exit(1);
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
