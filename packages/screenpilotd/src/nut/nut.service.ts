import { Injectable, Logger } from '@nestjs/common';
import {
  keyboard,
  mouse,
  straightTo,
  Point,
  Key,
  Button,
} from '@nut-tree-fork/nut-js';
import {
  Coordinates,
  MouseButton,
  ScrollDelta,
  errorMessage,
} from '@screenpilot/shared';
import { isWindows, logPlatformInfo } from '../utils/platform';
import keymap from './keymap.json';

type KeyInfo = { keyCode: Key; withShift: boolean };

// Friendly names ("ctrl", "pgdn") to canonical names
const KEY_ALIASES: Record<string, string> = keymap.aliases;
// Canonical and X keysym names to nut-js Key member names
const NAMED_KEYS: Record<string, string> = keymap.named;
const CHARACTER_KEYS: Record<string, { key: string; shift: boolean }> =
  keymap.characters;

const NutKeyMap = Object.entries(Key)
  // numeric enums also map value -> name; keep the name -> value pairs
  .filter((entry): entry is [string, Key] => typeof entry[1] === 'number')
  .reduce<Record<string, Key>>((map, [name, value]) => {
    map[name] = value;
    return map;
  }, {});

const NutKeyMapLowercase = Object.entries(NutKeyMap).reduce<
  Record<string, Key>
>((map, [name, value]) => {
  map[name.toLowerCase()] = value;
  return map;
}, {});

const BUTTONS: Record<MouseButton, Button> = {
  left: Button.LEFT,
  right: Button.RIGHT,
  middle: Button.MIDDLE,
};

/**
 * Thin wrapper around nut-js keyboard and mouse control.
 */
@Injectable()
export class NutService {
  private readonly logger = new Logger(NutService.name);

  constructor() {
    logPlatformInfo(this.logger);

    mouse.config.autoDelayMs = 100;
    keyboard.config.autoDelayMs = 100;
  }

  /**
   * Presses every key of a chord, then releases them in reverse order.
   * Entries may be compound, e.g. "ctrl+shift+p".
   */
  async sendKeys(keys: string[]): Promise<void> {
    const names = keys.flatMap((key) => this.parseKeyInput(key));
    if (names.length === 0) {
      throw new Error('Key combination is empty');
    }

    const nutKeys = names.map((name) => this.resolveKey(name));
    this.logger.log(`Sending keys: ${names.join('+')}`);

    try {
      await keyboard.pressKey(...nutKeys);
      await this.delay(100);
    } finally {
      await keyboard.releaseKey(...[...nutKeys].reverse());
    }
  }

  resolveKey(name: string): Key {
    const canonical = KEY_ALIASES[name.toLowerCase()] ?? name;
    const nutName = NAMED_KEYS[canonical] ?? canonical;
    const nutKey =
      NutKeyMap[nutName] ?? NutKeyMapLowercase[nutName.toLowerCase()];

    if (nutKey === undefined) {
      throw new Error(`Invalid key: '${name}'`);
    }
    return nutKey;
  }

  private parseKeyInput(keyInput: string): string[] {
    // a lone "+" is the plus key, not a separator
    if (keyInput.trim() === '+') {
      return ['+'];
    }
    return keyInput
      .split('+')
      .map((segment) => segment.trim())
      .filter((segment) => segment.length > 0);
  }

  /**
   * Types text one character at a time.
   */
  async typeText(text: string, delayMs = 0): Promise<void> {
    this.logger.log(
      `[KEYBOARD] Typing ${text.length} chars: "${text.substring(0, 100)}"`,
    );

    // Windows drops the first keystrokes if the target window is still settling
    if (isWindows()) {
      await this.delay(500);
    }

    // resolve every character before pressing anything
    const strokes: KeyInfo[] = [];
    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      if (char === '\r' && text[i + 1] === '\n') {
        continue;
      }
      const keyInfo = this.charToKeyInfo(char);
      if (!keyInfo) {
        throw new Error(
          `No key mapping found for character: ${JSON.stringify(char)} (code: ${char.charCodeAt(0)})`,
        );
      }
      strokes.push(keyInfo);
    }

    for (let i = 0; i < strokes.length; i++) {
      const { keyCode, withShift } = strokes[i];
      const chord = withShift ? [Key.LeftShift, keyCode] : [keyCode];
      await keyboard.pressKey(...chord);
      await this.delay(50);
      await keyboard.releaseKey(...chord);
      if (delayMs > 0 && i < strokes.length - 1) {
        await this.delay(delayMs);
      }
    }
  }

  charToKeyInfo(char: string): KeyInfo | null {
    if (/^[a-z0-9]$/.test(char)) {
      return { keyCode: this.resolveKey(char), withShift: false };
    }
    if (/^[A-Z]$/.test(char)) {
      return { keyCode: this.resolveKey(char.toLowerCase()), withShift: true };
    }

    const special = CHARACTER_KEYS[char];
    if (!special) {
      return null;
    }
    return { keyCode: this.resolveKey(special.key), withShift: special.shift };
  }

  async mouseMoveEvent({ x, y }: Coordinates): Promise<void> {
    this.logger.log(`Moving mouse to coordinates: (${x}, ${y})`);
    try {
      await mouse.setPosition(new Point(x, y));
    } catch (error) {
      throw new Error(`Failed to move mouse: ${errorMessage(error)}`);
    }
  }

  /**
   * Moves along a straight line instead of jumping, so drag targets see
   * intermediate motion events.
   */
  async mouseGlideEvent({ x, y }: Coordinates): Promise<void> {
    this.logger.log(`Gliding mouse to coordinates: (${x}, ${y})`);
    try {
      await mouse.move(straightTo(new Point(x, y)));
    } catch (error) {
      throw new Error(`Failed to move mouse: ${errorMessage(error)}`);
    }
  }

  async mouseClickEvent(button: MouseButton, clickCount = 1): Promise<void> {
    this.logger.log(`Clicking mouse button: ${button} x${clickCount}`);
    try {
      for (let i = 0; i < clickCount; i++) {
        await mouse.click(BUTTONS[button]);
      }
    } catch (error) {
      throw new Error(`Failed to click mouse button: ${errorMessage(error)}`);
    }
  }

  /**
   * Presses (`pressed` true) or releases a mouse button.
   */
  async mouseButtonEvent(button: MouseButton, pressed: boolean): Promise<void> {
    this.logger.log(
      `Mouse button event: ${button} ${pressed ? 'pressed' : 'released'}`,
    );
    try {
      if (pressed) {
        await mouse.pressButton(BUTTONS[button]);
      } else {
        await mouse.releaseButton(BUTTONS[button]);
      }
    } catch (error) {
      throw new Error(
        `Failed to send mouse ${button} button ${pressed ? 'press' : 'release'} event: ${errorMessage(error)}`,
      );
    }
  }

  /**
   * Scrolls by whole wheel steps. Positive `y` scrolls down, positive `x`
   * scrolls right.
   */
  async mouseWheelEvent(delta: ScrollDelta): Promise<void> {
    this.logger.log(`Mouse wheel event: (${delta.x}, ${delta.y})`);
    try {
      if (delta.y > 0) {
        await mouse.scrollDown(delta.y);
      } else if (delta.y < 0) {
        await mouse.scrollUp(-delta.y);
      }
      if (delta.x > 0) {
        await mouse.scrollRight(delta.x);
      } else if (delta.x < 0) {
        await mouse.scrollLeft(-delta.x);
      }
    } catch (error) {
      throw new Error(`Failed to scroll: ${errorMessage(error)}`);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
