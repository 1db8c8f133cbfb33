import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { loadConfig } from "../config/env.js";
import { errorMessage } from "../core/errors.js";
import { createConversationController } from "../runtime/chat-service.js";
import { formatSearchResults, greeting, setupLines } from "./chat-view.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const controller = createConversationController(config);
  const name = config.assistantName;

  const rl = readline.createInterface({ input, output });

  output.write(setupLines(config).join("\n") + "\n");
  output.write(greeting(name, controller.archiveEnabled).join("\n") + "\n");
  output.write("extra commands: /show, /search <term>\n\n");

  while (true) {
    const line = (await rl.question("you> ")).trim();

    if (!line) {
      continue;
    }

    if (line === "/exit") {
      break;
    }

    if (line === "/new") {
      controller.reset();
      output.write("new conversation started\n\n");
      continue;
    }

    if (line === "/show") {
      output.write(JSON.stringify(controller.store.snapshot(), null, 2) + "\n");
      continue;
    }

    if (line === "/search" || line.startsWith("/search ")) {
      const term = line.slice("/search".length);
      try {
        const entries = await controller.searchHistory(term);
        output.write(formatSearchResults(term, entries).join("\n") + "\n\n");
      } catch (error) {
        output.write(`error> search failed: ${errorMessage(error)}\n\n`);
      }
      continue;
    }

    output.write(`${name}> `);
    let streamed = false;
    try {
      const outcome = await controller.submit(line, {
        onToken: (token) => {
          streamed = true;
          output.write(token);
        },
      });
      if (outcome.status === "replied") {
        output.write(streamed ? "\n\n" : `${outcome.reply.text}\n\n`);
      }
    } catch (error) {
      output.write(`${streamed ? "\n" : ""}\nerror> ${errorMessage(error)}\n\n`);
    }
  }

  rl.close();
}

main().catch((error) => {
  process.stderr.write(`fatal> ${errorMessage(error)}\n`);
  process.exit(1);
});
