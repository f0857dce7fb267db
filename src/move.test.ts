import { describe, expect, test } from 'vitest';
import { decodeMove, EMPTY_MOVE, encodeMove, enPassantSquare, INVALID_MOVE } from './move.js';

describe('encode move', () => {
  test('quiet moves and captures', () => {
    expect(encodeMove({ role: 'pawn', from: 12, to: 20 })).toBe(0x4050_c1b5);
    expect(encodeMove({ role: 'pawn', from: 28, to: 37, captured: 'pawn' })).toBe(0x4095_c1ad);
    expect(encodeMove({ role: 'knight', from: 11, to: 17, captured: 'pawn' })).toBe(0x4044_b1ab);
    expect(encodeMove({ role: 'bishop', from: 0, to: 63, captured: 'queen' })).toBe(0x40fc_018a);
    expect(encodeMove({ role: 'rook', from: 54, to: 48, captured: 'bishop' })).toBe(0x40c3_6194);
    expect(encodeMove({ role: 'queen', from: 4, to: 60, captured: 'queen' })).toBe(0x40f0_4189);
    expect(encodeMove({ role: 'king', from: 19, to: 28, captured: 'pawn' })).toBe(0x4071_31a8);
  });

  test('promotions', () => {
    expect(encodeMove({ role: 'pawn', from: 49, to: 57, promotion: 'queen' })).toBe(0x40e7_1075);
    expect(encodeMove({ role: 'pawn', from: 14, to: 7, captured: 'rook', promotion: 'knight' })).toBe(0x401c_e0e5);
  });

  test('double steps record the en passant square', () => {
    expect(encodeMove({ role: 'pawn', from: 10, to: 26 })).toBe(0x1268_a1b5);
    expect(encodeMove({ role: 'pawn', from: 51, to: 35 })).toBe(0x2b8f_31b5);
    expect(encodeMove({ role: 'queen', from: 12, to: 28 })).toBe(0x4070_c1b1);
    expect(encodeMove({ role: 'rook', from: 51, to: 35 })).toBe(0x408f_31b4);
  });
});

test('en passant square', () => {
  expect(enPassantSquare('pawn', 12, 28)).toBe(20);
  expect(enPassantSquare('pawn', 52, 36)).toBe(44);
  expect(enPassantSquare('pawn', 12, 20)).toBeUndefined();
  expect(enPassantSquare('pawn', 20, 36)).toBeUndefined();
  expect(enPassantSquare('queen', 12, 28)).toBeUndefined();
});

test('decode move', () => {
  expect(decodeMove(0x1268_a1b5)).toEqual({ role: 'pawn', from: 10, to: 26 });
  expect(decodeMove(0x401c_e0e5)).toEqual({ role: 'pawn', from: 14, to: 7, captured: 'rook', promotion: 'knight' });
  expect(decodeMove(0x40fc_018a)).toEqual({ role: 'bishop', from: 0, to: 63, captured: 'queen' });
  expect(decodeMove(INVALID_MOVE)).toBeUndefined();
  expect(decodeMove(0x4068_a1b5)).toBeUndefined();
  expect(decodeMove(0x4050_c1b6 | 0x7)).toBeUndefined();
  expect(decodeMove(EMPTY_MOVE)).toBeUndefined();
});
