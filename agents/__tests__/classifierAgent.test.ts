import { classifyOperation, runClassification } from '../classifierAgent';

describe('classifyOperation', () => {
  it('treats same-state operations as internal', () => {
    expect(classifyOperation('SP', 'SP')).toBe('Interna');
  });

  it('treats different states as interstate', () => {
    expect(classifyOperation('SP', 'RJ')).toBe('Interestadual');
  });

  it('compares the state codes exactly', () => {
    expect(classifyOperation('SP', 'sp')).toBe('Interestadual');
  });
});

describe('runClassification', () => {
  it('annotates copies of the rows without touching the input', () => {
    const rows = [
      { accessKey: 'A1', emitterState: 'SP', recipientState: 'SP' },
      { accessKey: 'A2', emitterState: 'MG', recipientState: 'BA' },
    ];

    const classified = runClassification(rows);

    expect(classified).toEqual([
      { accessKey: 'A1', emitterState: 'SP', recipientState: 'SP', operationType: 'Interna' },
      { accessKey: 'A2', emitterState: 'MG', recipientState: 'BA', operationType: 'Interestadual' },
    ]);
    expect(rows[0]).not.toHaveProperty('operationType');
  });
});
