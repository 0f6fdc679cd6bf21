import { mentionsName, statementsConflict, toSearchKey } from '../../src/utils/statementMatch';

describe('mentionsName', () => {
  it('does not take a bare title for the character who carries it', () => {
    expect(mentionsName(toSearchKey('The inspector arrived at the quay.'), 'Inspector Vale')).toBe(false);
    expect(mentionsName(toSearchKey('Dr. Okafor was not there.'), 'Doctor Quill')).toBe(false);
  });

  it('finds a character by full name, given name or surname', () => {
    expect(mentionsName(toSearchKey('Vale arrived at the quay.'), 'Inspector Vale')).toBe(true);
    expect(mentionsName(toSearchKey('Inspector Vale arrived.'), 'Inspector Vale')).toBe(true);
    expect(mentionsName(toSearchKey('Quill locked the drawer.'), 'Mara Quill')).toBe(true);
    expect(mentionsName(toSearchKey('Mara locked the drawer.'), 'Mara Quill')).toBe(true);
  });

  it('ignores name parts of two letters or fewer and matches whole words only', () => {
    expect(mentionsName(toSearchKey('Jo waved from the boat.'), 'Jo Li')).toBe(false);
    expect(mentionsName(toSearchKey('The valence of the tide changed.'), 'Inspector Vale')).toBe(false);
  });
});

describe('statementsConflict', () => {
  it('treats opposite polarity about the same thing as a conflict and a restatement as none', () => {
    expect(statementsConflict('The harbour gate opens at dawn.', 'The harbour gate never opens.')).toBe(true);
    expect(statementsConflict('The harbour gate opens at dawn.', 'the harbour gate opens at dawn')).toBe(false);
  });
});
