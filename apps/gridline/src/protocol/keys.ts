export interface KeyModifiers {
  shift?: boolean;
  ctrl?: boolean;
  alt?: boolean;
  meta?: boolean;
}

export interface KeyInput extends KeyModifiers {
  /** `KeyboardEvent.key` style name: a printable character or a named key such as `ArrowUp`. */
  key: string;
}

const NAMED_KEYS: Record<string, string> = {
  Enter: 'CR',
  Tab: 'Tab',
  Backspace: 'BS',
  Escape: 'Esc',
  Delete: 'Del',
  Insert: 'Insert',
  Home: 'Home',
  End: 'End',
  PageUp: 'PageUp',
  PageDown: 'PageDown',
  ArrowUp: 'Up',
  ArrowDown: 'Down',
  ArrowLeft: 'Left',
  ArrowRight: 'Right',
  F1: 'F1',
  F2: 'F2',
  F3: 'F3',
  F4: 'F4',
  F5: 'F5',
  F6: 'F6',
  F7: 'F7',
  F8: 'F8',
  F9: 'F9',
  F10: 'F10',
  F11: 'F11',
  F12: 'F12',
};

/**
 * Encodes a key press in the editor's key notation (`<C-x>`, `<S-Tab>`, `<lt>`).
 * Returns null for keys that have no notation, such as bare modifier presses.
 */
export function encodeKey(input: KeyInput): string | null {
  const named = Object.prototype.hasOwnProperty.call(NAMED_KEYS, input.key) ? NAMED_KEYS[input.key] : undefined;
  if (named === undefined && [...input.key].length !== 1) {
    return null;
  }
  let value = named ?? input.key;
  let shift = input.shift === true;

  // CTRL-^ and CTRL-@ are typed on the digit row.
  if (input.ctrl && !input.shift && !input.alt) {
    if (value === '6') {
      value = '^';
    } else if (value === '2') {
      value = '@';
    }
  }

  if (named === undefined && isAsciiSymbol(input.key)) {
    shift = false;
  }

  if (value === '<') {
    value = 'lt';
  } else if (value === ' ' && (input.ctrl || input.alt || input.meta)) {
    value = 'Space';
  }

  const prefix = modifierLetters({ ...input, shift });
  const notation = [...prefix, value].join('-');
  return [...notation].length > 1 ? `<${notation}>` : notation;
}

/** Encodes typed text, escaping the characters key notation reserves. */
export function encodeText(text: string): string {
  let out = '';
  for (const char of text) {
    out += char === '<' ? '<lt>' : char;
  }
  return out;
}

/** Modifier string for mouse input, e.g. `SC` for shift+ctrl. */
export function encodeModifiers(modifiers: KeyModifiers): string {
  return modifierLetters(modifiers).join('');
}

function modifierLetters(modifiers: KeyModifiers): string[] {
  const letters: string[] = [];
  if (modifiers.shift) {
    letters.push('S');
  }
  if (modifiers.ctrl) {
    letters.push('C');
  }
  if (modifiers.alt) {
    letters.push('A');
  }
  if (modifiers.meta) {
    letters.push('D');
  }
  return letters;
}

function isAsciiSymbol(char: string): boolean {
  if (char.length !== 1) {
    return false;
  }
  const code = char.charCodeAt(0);
  return code < 0x80 && !/[a-zA-Z0-9]/.test(char);
}
