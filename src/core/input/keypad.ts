import { Chip8Error } from '@core/errors';

export const KEY_COUNT = 16;

// 16-key hex keypad (0..F). Also tracks the pending FX0A key-wait:
// while `waiting` is set, the next up->down transition is delivered to `waitRegister`.
export class Keypad {
  private pressed = new Array<boolean>(KEY_COUNT).fill(false);
  private _waiting = false;
  private _waitRegister = 0;

  get waiting(): boolean { return this._waiting; }
  get waitRegister(): number { return this._waitRegister; }

  // Returns true when this call is an up->down transition.
  setKey(key: number, down: boolean): boolean {
    this.checkKey(key);
    const wasDown = this.pressed[key];
    this.pressed[key] = down;
    return down && !wasDown;
  }

  isDown(key: number): boolean {
    this.checkKey(key);
    return this.pressed[key];
  }

  // Copy of the key vector, index = key id
  state(): boolean[] { return this.pressed.slice(); }

  beginWait(register: number): void {
    this._waiting = true;
    this._waitRegister = register;
  }

  endWait(): void {
    this._waiting = false;
    this._waitRegister = 0;
  }

  private checkKey(key: number): void {
    if (!Number.isInteger(key) || key < 0 || key >= KEY_COUNT) {
      throw new Chip8Error('InvalidKey', `Key ${key} is not in 0..15`);
    }
  }
}
