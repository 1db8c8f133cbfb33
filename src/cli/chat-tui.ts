import blessed from "blessed";
import { type AppConfig, loadConfig } from "../config/env.js";
import { errorMessage } from "../core/errors.js";
import { type ConversationController, createConversationController } from "../runtime/chat-service.js";
import {
  appendReplyToken,
  beginReply,
  type ChatMode,
  type ChatViewState,
  completeReply,
  createViewState,
  failReply,
  formatSearchResults,
  greeting,
  pushLine,
  resetLines,
  setupLines,
  toggleMode,
} from "./chat-view.js";

/**
 * 파일 목적:
 * - blessed 로 그린 채팅 창. 입력 라인을 ConversationController.submit 으로 넘기고
 *   transcript 와 응답(스트리밍 토큰 포함)을 로그 영역에 표시한다.
 * - 검색 모드에서는 입력을 history archive 검색어로 사용한다.
 *
 * 주요 의존성:
 * - runtime/chat-service: 대화 상태 관리
 * - chat-view: 표시 상태/포맷
 * - blessed: 화면 분할/입력/스크롤 렌더링
 *
 * 역의존성:
 * - package.json `npm start`
 */

interface UiParts {
  screen: blessed.Widgets.Screen;
  header: blessed.Widgets.BoxElement;
  logBox: blessed.Widgets.BoxElement;
  inputPane: blessed.Widgets.BoxElement;
  promptLabel: blessed.Widgets.TextElement;
  inputBox: blessed.Widgets.TextboxElement;
}

const RENDER_THROTTLE_MS = 33;

class ChatTuiApp {
  private readonly view: ChatViewState = createViewState();
  private readonly controller: ConversationController;
  private readonly ui: UiParts;

  private renderTimer: NodeJS.Timeout | undefined;
  private doneResolver: (() => void) | undefined;

  constructor(private readonly config: AppConfig) {
    this.controller = createConversationController(config, {
      log: (line) => {
        pushLine(this.view, line);
        this.requestRender(false);
      },
    });
    this.ui = this.createUi();
    this.bindUiEvents();
    for (const line of [...setupLines(config), ...greeting(config.assistantName, this.controller.archiveEnabled)]) {
      pushLine(this.view, line);
    }
    this.ui.inputBox.focus();
    this.requestRender(true);
  }

  /** `/exit` 또는 `Ctrl+C` 로 창이 닫힐 때 resolve 된다. */
  run(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.doneResolver = resolve;
    });
  }

  private createUi(): UiParts {
    const screen = blessed.screen({
      smartCSR: true,
      fullUnicode: true,
      title: `${this.config.assistantName} chat`,
      dockBorders: true,
    });

    const header = blessed.box({
      parent: screen,
      top: 0,
      left: 0,
      width: "100%",
      height: 1,
      style: { fg: "white", bg: "blue" },
    });

    const logBox = blessed.box({
      parent: screen,
      top: 1,
      left: 0,
      width: "100%",
      bottom: 3,
      scrollable: true,
      alwaysScroll: true,
      mouse: true,
      keys: true,
      vi: true,
      scrollbar: {
        ch: " ",
        track: { bg: "black" },
        style: { bg: "white" },
      },
      style: { fg: "white", bg: "black" },
    });

    const inputPane = blessed.box({
      parent: screen,
      bottom: 0,
      left: 0,
      width: "100%",
      height: 3,
      style: { bg: "gray" },
    });

    const promptLabel = blessed.text({
      parent: inputPane,
      top: 1,
      left: 2,
      content: this.promptText(),
      style: { fg: "white", bg: "gray", bold: true },
    });

    const inputBox = blessed.textbox({
      parent: inputPane,
      inputOnFocus: true,
      keys: true,
      mouse: true,
      top: 1,
      left: 11,
      right: 2,
      height: 1,
      style: { fg: "white", bg: "gray" },
    });

    return { screen, header, logBox, inputPane, promptLabel, inputBox };
  }

  private bindUiEvents(): void {
    this.ui.screen.key(["C-c"], () => this.shutdown());
    this.ui.inputBox.key(["C-c"], () => this.shutdown());

    this.ui.screen.on("resize", () => {
      this.requestRender(true);
    });

    this.ui.inputBox.key(["C-t"], () => {
      this.setMode(toggleMode(this.view.mode));
    });

    this.ui.inputBox.key("enter", () => {
      this.ui.inputBox.submit();
    });

    this.ui.inputBox.on("submit", (value) => {
      const raw = typeof value === "string" ? value : this.ui.inputBox.getValue();
      this.ui.inputBox.clearValue();
      this.ui.inputBox.focus();
      void this.handleSubmittedLine(raw);
    });
  }

  private promptText(): string {
    return this.view.mode === "chat" ? "  ask>" : "search>";
  }

  private setMode(mode: ChatMode): void {
    this.view.mode = mode;
    this.ui.promptLabel.setContent(this.promptText());
    this.requestRender(true);
  }

  private async handleSubmittedLine(raw: string): Promise<void> {
    const line = raw.trim();
    if (!line) {
      this.requestRender(true);
      return;
    }

    if (line === "/exit") {
      this.shutdown();
      return;
    }

    if (line === "/new") {
      try {
        this.controller.reset();
        resetLines(this.view);
        pushLine(this.view, "new conversation started.");
      } catch (error) {
        pushLine(this.view, `[error] ${errorMessage(error)}`);
      }
      this.requestRender(true);
      return;
    }

    if (line.startsWith("/mode")) {
      const value = line.slice(5).trim();
      if (value === "chat" || value === "search") {
        this.setMode(value);
      } else {
        pushLine(this.view, "[error] invalid mode (chat|search)");
        this.requestRender(true);
      }
      return;
    }

    if (this.view.mode === "search") {
      await this.runSearch(line);
      return;
    }

    await this.runTurn(line);
  }

  private async runSearch(term: string): Promise<void> {
    pushLine(this.view, "");
    pushLine(this.view, `searching for '${term}'...`);
    this.requestRender(true);
    try {
      const entries = await this.controller.searchHistory(term);
      for (const line of formatSearchResults(term, entries)) {
        pushLine(this.view, line);
      }
    } catch (error) {
      pushLine(this.view, `[error] search failed: ${errorMessage(error)}`);
    }
    this.requestRender(true);
  }

  private async runTurn(question: string): Promise<void> {
    const name = this.config.assistantName;
    if (this.controller.state !== "idle") {
      pushLine(this.view, "[error] a reply is still pending; wait for it before sending another message");
      this.requestRender(true);
      return;
    }

    beginReply(this.view, name, question);
    this.requestRender(true);

    try {
      const outcome = await this.controller.submit(question, {
        onToken: (token) => {
          appendReplyToken(this.view, name, token);
          this.requestRender(false);
        },
      });
      if (outcome.status === "replied") {
        completeReply(this.view, name, outcome.reply.text);
      }
    } catch (error) {
      failReply(this.view, errorMessage(error));
    }
    this.requestRender(true);
  }

  private buildHeader(): string {
    const { provider, model } = this.config.candidate;
    const state = this.controller.state === "idle" ? "idle" : "waiting for reply";
    return ` ${this.config.assistantName} | ${provider}/${model} | mode=${this.view.mode} | ${state} | turns=${this.controller.store.size}`;
  }

  /**
   * 렌더 요청을 스로틀링한다.
   * 토큰 스트리밍 중에는 33ms 단위로만 실제 렌더를 수행한다.
   */
  private requestRender(immediate: boolean): void {
    if (immediate) {
      if (this.renderTimer) {
        clearTimeout(this.renderTimer);
        this.renderTimer = undefined;
      }
      this.render();
      return;
    }

    if (this.renderTimer) {
      return;
    }

    this.renderTimer = setTimeout(() => {
      this.renderTimer = undefined;
      this.render();
    }, RENDER_THROTTLE_MS);
  }

  private render(): void {
    this.ui.header.setContent(this.buildHeader());
    this.ui.logBox.setContent(this.view.lines.join("\n"));
    this.ui.logBox.setScrollPerc(100);
    this.ui.screen.render();
  }

  private shutdown(): void {
    if (this.renderTimer) {
      clearTimeout(this.renderTimer);
      this.renderTimer = undefined;
    }

    this.ui.screen.destroy();
    this.doneResolver?.();
  }
}

async function main(): Promise<void> {
  // 자격 증명이 없으면 여기서 실패하고 창은 만들어지지 않는다.
  const config = loadConfig();
  const app = new ChatTuiApp(config);
  await app.run();
}

main().catch((error) => {
  process.stderr.write(`fatal> ${errorMessage(error)}\n`);
  process.exit(1);
});
