/**
 * A single poll of the keyboard. Keys are named by their `KeyboardEvent.code` (eg. 'KeyA', 'ShiftLeft'),
 * so the names are layout-independent.
 */
export type KeyboardSnapshot = {
    readonly pressed: ReadonlySet<string>;
    readonly capsLock: boolean;
    readonly numLock: boolean;
};

export const emptyKeyboardSnapshot: KeyboardSnapshot = {
    pressed: new Set<string>(),
    capsLock: false,
    numLock: false,
};

// callers usually keep one live Set updated by key listeners, so every state takes its own copy
const freeze = (snapshot: KeyboardSnapshot): KeyboardSnapshot => ({ ...snapshot, pressed: new Set(snapshot.pressed) });

const SHIFT_KEYS = ['ShiftLeft', 'ShiftRight'] as const;
const CONTROL_KEYS = ['ControlLeft', 'ControlRight'] as const;
const ALT_KEYS = ['AltLeft', 'AltRight'] as const;

/**
 * Pairs the current keyboard poll with the previous one, so that callers can ask about
 * transitions (a key going down or coming up) as well as the current state.
 *
 * Instances never change: call `next` with a fresh poll once per frame to advance.
 */
export class KeyboardState {
    readonly #current: KeyboardSnapshot;
    readonly #previous: KeyboardSnapshot;

    constructor(current: KeyboardSnapshot, previous: KeyboardSnapshot = emptyKeyboardSnapshot) {
        this.#current = freeze(current);
        this.#previous = freeze(previous);
    }

    get capsLock(): boolean {
        return this.#current.capsLock;
    }

    get numLock(): boolean {
        return this.#current.numLock;
    }

    isKeyDown(key: string): boolean {
        return this.#current.pressed.has(key);
    }

    isKeyUp(key: string): boolean {
        return !this.#current.pressed.has(key);
    }

    isShiftDown(): boolean {
        return SHIFT_KEYS.some((k) => this.isKeyDown(k));
    }

    isControlDown(): boolean {
        return CONTROL_KEYS.some((k) => this.isKeyDown(k));
    }

    isAltDown(): boolean {
        return ALT_KEYS.some((k) => this.isKeyDown(k));
    }

    pressedKeys(): string[] {
        return [...this.#current.pressed];
    }

    /**
     * @returns true iff the key was up in the previous poll and is down now
     */
    isKeyPressed(key: string): boolean {
        return !this.#previous.pressed.has(key) && this.#current.pressed.has(key);
    }

    /**
     * @returns true iff the key was down in the previous poll and is up now
     */
    isKeyReleased(key: string): boolean {
        return this.#previous.pressed.has(key) && !this.#current.pressed.has(key);
    }

    wasAnyKeyJustDown(): boolean {
        return this.#previous.pressed.size > 0;
    }

    next(snapshot: KeyboardSnapshot): KeyboardState {
        return new KeyboardState(snapshot, this.#current);
    }
}
