import blessed from "blessed";
import { formatSourcesForUI } from "./rag/context-builder.js";
import { ArchivistError, OperationCancelledError, describeError } from "./rag/errors.js";
import type { QueryOrchestrator } from "./rag/query-orchestrator.js";
import type { SearchFilters } from "./rag/types.js";

export interface ChatOptions {
  filters?: SearchFilters;
  model?: string;
  title?: string;
}

/** Interactive question loop. Resolves when the user quits. */
export function runChat(orchestrator: QueryOrchestrator, options: ChatOptions = {}): Promise<void> {
  return new Promise((resolve) => {
    let busy = false;
    let inFlight: AbortController | null = null;

    // ── UI Setup ──────────────────────────────────────────────────────────
    const screen = blessed.screen({
      smartCSR: true,
      title: "archivist",
    });

    const chatBox = blessed.log({
      parent: screen,
      top: 0,
      left: 0,
      width: "100%",
      height: "100%-3",
      scrollable: true,
      alwaysScroll: true,
      scrollbar: {
        ch: "│",
        style: { bg: "blue" },
      },
      border: { type: "line" },
      style: {
        border: { fg: "blue" },
      },
      label: ` ${options.title ?? "archivist"} `,
      tags: true,
      mouse: true,
    });

    const inputBox = blessed.textbox({
      parent: screen,
      bottom: 0,
      left: 0,
      width: "100%",
      height: 3,
      border: { type: "line" },
      style: {
        border: { fg: "green" },
        focus: { border: { fg: "yellow" } },
      },
      label: " ask > ",
      inputOnFocus: false,
      mouse: true,
    });

    const quit = () => {
      inFlight?.abort();
      stopSpinner();
      screen.destroy();
      resolve();
    };

    screen.key(["C-c"], quit);
    inputBox.key(["C-c"], quit);

    // Re-focus input whenever it loses focus (e.g. mouse click on chatBox)
    // Use setTimeout to break the blur→focus→render→blur cycle
    inputBox.on("blur", () => {
      if (!busy) setTimeout(() => promptInput(), 0);
    });

    chatBox.log("Ask a question about your documents. Esc cancels a running query, Ctrl+C quits.");
    chatBox.log("");
    screen.render();

    function promptInput(): void {
      inputBox.readInput(() => {/* handled by submit event */});
    }

    // ── Spinner ───────────────────────────────────────────────────────────
    const spinFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
    let spinIdx = 0;
    let spinTimer: ReturnType<typeof setInterval> | null = null;
    let spinElapsed = 0;
    let spinLabel = "searching";

    function lastLineHasSpinner(): boolean {
      const lines = chatBox.getLines();
      const last = lines[lines.length - 1];
      return last !== undefined && last.includes(spinLabel);
    }

    function startSpinner(label: string): void {
      stopSpinner();
      spinLabel = label;
      spinIdx = 0;
      spinElapsed = 0;
      updateSpinnerLine();
      spinTimer = setInterval(() => {
        spinIdx = (spinIdx + 1) % spinFrames.length;
        spinElapsed += 100;
        updateSpinnerLine();
      }, 100);
    }

    function updateSpinnerLine(): void {
      if (lastLineHasSpinner()) chatBox.deleteLine(chatBox.getLines().length - 1);
      const secs = (spinElapsed / 1000).toFixed(1);
      chatBox.log(`{grey-fg}  ${spinFrames[spinIdx] ?? ""} ${spinLabel}... ${secs}s{/}`);
      screen.render();
    }

    function stopSpinner(): void {
      if (spinTimer) {
        clearInterval(spinTimer);
        spinTimer = null;
      }
      if (lastLineHasSpinner()) chatBox.deleteLine(chatBox.getLines().length - 1);
    }

    // ── Question Logic ────────────────────────────────────────────────────
    async function answer(question: string, signal: AbortSignal): Promise<void> {
      startSpinner("searching and answering");
      const response = await orchestrator.ask(question, {
        filters: options.filters,
        model: options.model,
        signal,
      });
      stopSpinner();

      for (const line of response.answer.split("\n")) {
        chatBox.log("  " + line);
      }
      if (response.sources.length > 0) {
        chatBox.log(`{grey-fg}  \u{2713} \u{1F4C4} ${formatSourcesForUI(response.sources)}{/}`);
      }
      const confidence = Math.round(response.confidence * 100);
      chatBox.log(
        `{grey-fg}  confidence ${confidence}% · ${response.searchResultsCount} passage(s)` +
          (response.model ? ` · ${response.model}` : "") +
          "{/}",
      );
      screen.render();
    }

    // ── Input Handler ─────────────────────────────────────────────────────
    inputBox.on("submit", (value: string) => {
      const text = value.trim();
      inputBox.clearValue();
      screen.render();

      if (!text || busy) {
        promptInput();
        return;
      }

      chatBox.log(`{green-fg}ask >{/} ${text}`);
      busy = true;
      inputBox.style.border.fg = "grey";
      inputBox.setLabel(" ... ");
      screen.render();

      const controller = new AbortController();
      inFlight = controller;

      void answer(text, controller.signal)
        .catch((err: unknown) => {
          stopSpinner();
          if (err instanceof OperationCancelledError || controller.signal.aborted) {
            chatBox.log("{yellow-fg}cancelled{/}");
            return;
          }
          chatBox.log(`{red-fg}error:{/} ${describeError(err)}`);
          if (err instanceof ArchivistError && err.hint) {
            chatBox.log(`{grey-fg}  ${err.hint}{/}`);
          }
        })
        .finally(() => {
          busy = false;
          inFlight = null;
          chatBox.log("");
          inputBox.style.border.fg = "green";
          inputBox.setLabel(" ask > ");
          screen.render();
          promptInput();
        });
    });

    inputBox.key(["escape"], () => {
      if (inFlight) {
        inFlight.abort();
      } else {
        inputBox.cancel();
      }
    });

    screen.render();
    promptInput();
  });
}
