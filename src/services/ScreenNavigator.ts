/**
 * Screen Navigator - screen lifecycle and key dispatch
 *
 * Every screen implements the same lifecycle (onShow/onHide) and exposes the
 * keymap it resolved when shown. The navigator owns the single active
 * CountingSession.
 */

import type {
  CountingSystemId,
  KeyCommand,
  KeyOutcome,
  Keymap,
  ScreenName,
  SessionSnapshot,
} from "../types.ts";
import type { LedgerOptions } from "../strategy/CountingLedger.ts";
import { getCountingSystem } from "../strategy/CountingSystems.ts";
import { CountingSession } from "./CountingSession.ts";
import {
  HILO_HOTKEY_GROUPS,
  buildHiLoKeymap,
  buildModeSelectionKeymap,
  buildStartMenuKeymap,
  buildWongHalvesKeymap,
  normalizeKey,
} from "./KeyBindings.ts";
import { logger } from "../utils/logger.ts";

const EMPTY_KEYMAP: Keymap = new Map();

export interface Screen {
  readonly name: ScreenName;
  onShow(): void;
  onHide(): void;
  keymap(): Keymap;
  /** Handle a screen-local command; returns true when state changed */
  handle(command: KeyCommand): boolean;
}

export abstract class BaseScreen implements Screen {
  abstract readonly name: ScreenName;
  private resolved: Keymap | null = null;

  onShow(): void {
    this.resolved = this.resolveKeymap();
  }

  onHide(): void {
    this.resolved = null;
  }

  keymap(): Keymap {
    return this.resolved ?? EMPTY_KEYMAP;
  }

  handle(_command: KeyCommand): boolean {
    return false;
  }

  protected get isActive(): boolean {
    return this.resolved !== null;
  }

  /** Re-resolve after an option change, only while shown */
  protected refreshKeymap(): void {
    if (this.isActive) {
      this.resolved = this.resolveKeymap();
    }
  }

  protected abstract resolveKeymap(): Keymap;
}

export class StartMenuScreen extends BaseScreen {
  readonly name = "StartMenu";

  protected resolveKeymap(): Keymap {
    return buildStartMenuKeymap();
  }
}

export class ModeSelectionScreen extends BaseScreen {
  readonly name = "ModeSelection";

  protected resolveKeymap(): Keymap {
    return buildModeSelectionKeymap();
  }
}

export abstract class CountingScreen extends BaseScreen {
  private session: CountingSession | null = null;

  attach(session: CountingSession): void {
    this.session = session;
  }

  detach(): void {
    this.session = null;
  }

  handle(command: KeyCommand): boolean {
    if (!this.session) return false;
    return this.session.apply(command);
  }
}

export interface HiLoScreenOptions {
  rankMode?: boolean;
  enabledGroups?: Iterable<string>;
}

export class HiLoScreen extends CountingScreen {
  readonly name = "HiLo";
  private rankMode: boolean;
  private enabledGroups: Set<string>;

  constructor(options: HiLoScreenOptions = {}) {
    super();
    this.rankMode = options.rankMode ?? false;
    this.enabledGroups = new Set(options.enabledGroups ?? HILO_HOTKEY_GROUPS.map((group) => group.name));
  }

  isRankMode(): boolean {
    return this.rankMode;
  }

  setRankMode(enabled: boolean): void {
    if (this.rankMode === enabled) return;
    this.rankMode = enabled;
    logger.info(`[HiLoScreen] Rank mode ${enabled ? 'ENABLED' : 'DISABLED'}`);
    this.refreshKeymap();
  }

  isHotkeyGroupEnabled(name: string): boolean {
    return this.enabledGroups.has(name);
  }

  setHotkeyGroupEnabled(name: string, enabled: boolean): void {
    if (!HILO_HOTKEY_GROUPS.some((group) => group.name === name)) {
      logger.warn(`[HiLoScreen] Unknown hotkey group: ${name}`);
      return;
    }
    if (this.enabledGroups.has(name) === enabled) return;

    const next = new Set(this.enabledGroups);
    if (enabled) {
      next.add(name);
    } else {
      next.delete(name);
    }
    this.enabledGroups = next;

    logger.info(`[HiLoScreen] Hotkey group '${name}' ${enabled ? 'ENABLED' : 'DISABLED'}`);
    this.refreshKeymap();
  }

  handle(command: KeyCommand): boolean {
    switch (command.type) {
      case "toggleRankMode":
        this.setRankMode(!this.rankMode);
        return true;

      case "toggleHotkeyGroup":
        this.setHotkeyGroupEnabled(command.group, !this.enabledGroups.has(command.group));
        return true;

      default:
        return super.handle(command);
    }
  }

  protected resolveKeymap(): Keymap {
    return buildHiLoKeymap({ enabledGroups: this.enabledGroups, rankMode: this.rankMode });
  }
}

export class WongHalvesScreen extends CountingScreen {
  readonly name = "WongHalves";

  protected resolveKeymap(): Keymap {
    return buildWongHalvesKeymap();
  }
}

export interface NavigatorOptions {
  ledger?: LedgerOptions;
  hiLo?: HiLoScreenOptions;
}

const MODE_SCREENS: Record<CountingSystemId, "HiLo" | "WongHalves"> = {
  "hi-lo": "HiLo",
  "wong-halves": "WongHalves",
};

export class ScreenNavigator {
  private readonly ledgerOptions: LedgerOptions;
  private readonly menus: Record<"StartMenu" | "ModeSelection", BaseScreen>;
  private readonly modes: Record<"HiLo" | "WongHalves", CountingScreen>;
  private current: Screen;
  private session: CountingSession | null = null;

  constructor(options: NavigatorOptions = {}) {
    this.ledgerOptions = options.ledger ?? {};
    this.menus = {
      StartMenu: new StartMenuScreen(),
      ModeSelection: new ModeSelectionScreen(),
    };
    this.modes = {
      HiLo: new HiLoScreen(options.hiLo),
      WongHalves: new WongHalvesScreen(),
    };

    this.current = this.menus.StartMenu;
    this.current.onShow();
  }

  getScreen(name: ScreenName): Screen {
    if (name === "StartMenu" || name === "ModeSelection") {
      return this.menus[name];
    }
    return this.modes[name];
  }

  get activeScreen(): Screen {
    return this.current;
  }

  get activeSession(): CountingSession | null {
    return this.session;
  }

  show(name: ScreenName): void {
    const next = this.getScreen(name);
    if (next === this.current) return;

    this.current.onHide();
    this.current = next;
    this.current.onShow();

    logger.debug(`[ScreenNavigator] Showing ${name}`);
  }

  /**
   * Start a new shoe. Any previous session is discarded.
   */
  startMode(systemId: CountingSystemId, decks?: number): CountingSession {
    const ledgerOptions: LedgerOptions = decks === undefined
      ? this.ledgerOptions
      : { ...this.ledgerOptions, decksTotal: decks };

    const session = new CountingSession(getCountingSystem(systemId), ledgerOptions);

    for (const screen of Object.values(this.modes)) {
      screen.detach();
    }
    this.session = session;

    const screenName = MODE_SCREENS[systemId];
    this.modes[screenName].attach(session);
    this.show(screenName);

    return session;
  }

  handleKey(key: string): KeyOutcome {
    const command = this.current.keymap().get(normalizeKey(key));
    if (command === undefined) {
      return { handled: false, changed: false };
    }
    return { handled: true, changed: this.dispatch(command) };
  }

  dispatch(command: KeyCommand): boolean {
    switch (command.type) {
      case "navigate":
        if (command.screen === "StartMenu" || command.screen === "ModeSelection") {
          this.endSession();
        }
        this.show(command.screen);
        return true;

      case "start":
        this.startMode(command.system);
        return true;

      default:
        return this.current.handle(command);
    }
  }

  snapshot(): SessionSnapshot | null {
    return this.session ? this.session.snapshot() : null;
  }

  private endSession(): void {
    if (!this.session) return;

    logger.info(`[ScreenNavigator] Ending ${this.session.system.name} session`);
    for (const screen of Object.values(this.modes)) {
      screen.detach();
    }
    this.session = null;
  }
}
