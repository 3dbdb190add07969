import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  BaseScreen,
  HiLoScreen,
  ScreenNavigator,
} from "../src/services/ScreenNavigator.ts";
import type { Keymap } from "../src/types.ts";
import { logger } from "../src/utils/logger.ts";

beforeEach(() => {
  vi.spyOn(logger, "info").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

function hiLoNavigator(): ScreenNavigator {
  const navigator = new ScreenNavigator();
  navigator.startMode("hi-lo");
  return navigator;
}

describe("ScreenNavigator navigation", () => {
  it("opens on the start menu with no session", () => {
    const navigator = new ScreenNavigator();

    expect(navigator.activeScreen.name).toBe("StartMenu");
    expect(navigator.activeSession).toBeNull();
    expect(navigator.snapshot()).toBeNull();
  });

  it("walks from the start menu into a counting screen", () => {
    const navigator = new ScreenNavigator();

    expect(navigator.handleKey("n")).toEqual({ handled: true, changed: true });
    expect(navigator.activeScreen.name).toBe("ModeSelection");

    expect(navigator.handleKey("hilo")).toEqual({ handled: true, changed: true });
    expect(navigator.activeScreen.name).toBe("HiLo");
    expect(navigator.activeSession?.system.id).toBe("hi-lo");
  });

  it("ignores unbound keys", () => {
    const navigator = new ScreenNavigator();

    expect(navigator.handleKey("zz")).toEqual({ handled: false, changed: false });
    expect(navigator.activeScreen.name).toBe("StartMenu");
  });

  it("goes back from mode selection", () => {
    const navigator = new ScreenNavigator();
    navigator.handleKey("n");
    navigator.handleKey("b");

    expect(navigator.activeScreen.name).toBe("StartMenu");
  });

  it("ends the session when returning to the menu", () => {
    const navigator = hiLoNavigator();
    navigator.handleKey("l");

    navigator.handleKey("menu");

    expect(navigator.activeScreen.name).toBe("ModeSelection");
    expect(navigator.activeSession).toBeNull();
    expect(navigator.snapshot()).toBeNull();
  });

  it("replaces the session when a new one starts", () => {
    const navigator = hiLoNavigator();
    const first = navigator.activeSession;
    navigator.handleKey("l");

    const second = navigator.startMode("hi-lo");

    expect(second).not.toBe(first);
    expect(navigator.snapshot()?.cardsSeen).toBe("Cards seen: 0");
  });

  it("starts a session with a custom deck count", () => {
    const navigator = new ScreenNavigator();
    const session = navigator.startMode("wong-halves", 2);

    expect(navigator.activeScreen.name).toBe("WongHalves");
    expect(session.ledger.decksTotal).toBe(2);
  });
});

describe("ScreenNavigator lifecycle", () => {
  it("resolves a keymap on show and drops it on hide", () => {
    const navigator = new ScreenNavigator();
    const startMenu = navigator.getScreen("StartMenu");
    expect(startMenu.keymap().size).toBeGreaterThan(0);

    navigator.show("ModeSelection");

    expect(startMenu.keymap().size).toBe(0);
    expect(navigator.getScreen("ModeSelection").keymap().size).toBeGreaterThan(0);
  });

  it("calls onHide then onShow when switching screens", () => {
    const navigator = new ScreenNavigator();
    const calls: string[] = [];
    const startMenu = navigator.getScreen("StartMenu");
    const modeSelection = navigator.getScreen("ModeSelection");
    vi.spyOn(startMenu, "onHide").mockImplementation(() => {
      calls.push("hide StartMenu");
    });
    vi.spyOn(modeSelection, "onShow").mockImplementation(() => {
      calls.push("show ModeSelection");
    });

    navigator.show("ModeSelection");

    expect(calls).toEqual(["hide StartMenu", "show ModeSelection"]);
  });

  it("does not re-show the active screen", () => {
    const navigator = new ScreenNavigator();
    const onShow = vi.spyOn(navigator.getScreen("StartMenu"), "onShow");

    navigator.show("StartMenu");

    expect(onShow).not.toHaveBeenCalled();
  });

  it("gives every screen no-op defaults", () => {
    class EmptyScreen extends BaseScreen {
      readonly name = "StartMenu";
      protected resolveKeymap(): Keymap {
        return new Map();
      }
    }
    const screen = new EmptyScreen();

    expect(screen.keymap().size).toBe(0);
    expect(screen.handle({ type: "undo" })).toBe(false);
    screen.onShow();
    screen.onHide();
    expect(screen.keymap().size).toBe(0);
  });
});

describe("Hi-Lo screen", () => {
  it("records Low and Hi through hotkeys", () => {
    const navigator = hiLoNavigator();

    expect(navigator.handleKey("L")).toEqual({ handled: true, changed: true });
    navigator.handleKey("right");

    const snapshot = navigator.snapshot();
    expect(snapshot?.history).toBe("Low(+1)  Hi(-1)");
    expect(snapshot?.runningCount).toBe("+0");
    expect(snapshot?.cardsSeen).toBe("Cards seen: 2");
  });

  it("undoes, redoes and resets through shoe keys", () => {
    const navigator = hiLoNavigator();
    navigator.handleKey("l");
    navigator.handleKey("l");

    expect(navigator.handleKey("<")).toEqual({ handled: true, changed: true });
    expect(navigator.snapshot()?.runningCount).toBe("+1");

    expect(navigator.handleKey(".")).toEqual({ handled: true, changed: true });
    expect(navigator.snapshot()?.runningCount).toBe("+2");
    expect(navigator.handleKey("ctrl+shift+z")).toEqual({ handled: true, changed: false });

    expect(navigator.handleKey("ctrl+r")).toEqual({ handled: true, changed: true });
    expect(navigator.snapshot()?.history).toBe("-");
  });

  it("reports no change once the undo budget is spent", () => {
    const navigator = new ScreenNavigator({ ledger: { undoBudget: 1 } });
    navigator.startMode("hi-lo");
    navigator.handleKey("l");
    navigator.handleKey("l");

    expect(navigator.handleKey("ctrl+z")).toEqual({ handled: true, changed: true });
    expect(navigator.handleKey("ctrl+z")).toEqual({ handled: true, changed: false });
  });

  it("toggles rank mode", () => {
    const navigator = hiLoNavigator();
    expect(navigator.handleKey("2")).toEqual({ handled: false, changed: false });

    expect(navigator.handleKey("rank")).toEqual({ handled: true, changed: true });
    navigator.handleKey("2");
    navigator.handleKey("e");
    navigator.handleKey("7");

    expect(navigator.snapshot()?.history).toBe("Low(+1)  Hi(-1)");
  });

  it("starts in rank mode when configured", () => {
    const navigator = new ScreenNavigator({ hiLo: { rankMode: true } });
    navigator.startMode("hi-lo");

    expect(navigator.handleKey("5")).toEqual({ handled: true, changed: true });
  });

  it("toggles hotkey groups", () => {
    const navigator = hiLoNavigator();

    navigator.handleKey("hotkeys letters");
    expect(navigator.handleKey("l")).toEqual({ handled: false, changed: false });
    expect(navigator.handleKey("a")).toEqual({ handled: true, changed: true });

    navigator.handleKey("hotkeys letters");
    expect(navigator.handleKey("l")).toEqual({ handled: true, changed: true });
  });

  it("ignores unknown hotkey groups", () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});
    const screen = new HiLoScreen();

    screen.setHotkeyGroupEnabled("numpad", false);

    expect(screen.isHotkeyGroupEnabled("numpad")).toBe(false);
    expect(warn).toHaveBeenCalledWith("[HiLoScreen] Unknown hotkey group: numpad");
  });

  it("keeps option changes made while hidden", () => {
    const screen = new HiLoScreen();
    screen.setRankMode(true);
    expect(screen.keymap().size).toBe(0);

    screen.onShow();

    expect(screen.isRankMode()).toBe(true);
    expect(screen.keymap().get("3")).toEqual({ type: "record", label: "Low", value: 1 });
  });
});

describe("Wong Halves screen", () => {
  it("records weighted ranks", () => {
    const navigator = new ScreenNavigator();
    navigator.startMode("wong-halves");

    navigator.handleKey("r");
    navigator.handleKey("c");
    navigator.handleKey("q");

    const snapshot = navigator.snapshot();
    expect(snapshot?.history).toBe("5(+1.5)  K(-1)  2(+0.5)");
    expect(snapshot?.runningCount).toBe("+1");
    expect(snapshot?.trueCount).toBe("+0.17");
  });

  it("does not respond to Hi-Lo keys", () => {
    const navigator = new ScreenNavigator();
    navigator.startMode("wong-halves");

    expect(navigator.handleKey("l")).toEqual({ handled: false, changed: false });
    expect(navigator.handleKey("rank")).toEqual({ handled: false, changed: false });
  });
});
