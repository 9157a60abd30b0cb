export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface RegisterState {
  v: Byte[]; // V0..VF
  i: Word; // index register
  pc: Word; // program counter
  sp: number; // stack depth
  stack: Word[]; // return addresses, oldest first
}
