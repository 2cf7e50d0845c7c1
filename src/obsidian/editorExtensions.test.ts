import { describe, it, expect } from 'vitest';
import { EditorState } from '@codemirror/state';
import { CompletionContext } from '@codemirror/autocomplete';
import { wavejsonCompletions } from './editorExtensions';

function complete(doc: string, explicit = false) {
  const state = EditorState.create({ doc });
  return wavejsonCompletions(new CompletionContext(state, doc.length, explicit));
}

describe('wavejsonCompletions', () => {
  it('offers the whole vocabulary from the start of the typed symbol', () => {
    const result = complete('{ sig');

    expect(result?.from).toBe(2);
    expect(result?.options).toHaveLength(18);
    expect(result?.options[0]).toEqual({ label: 'signal', type: 'keyword' });
    expect(result?.options.find(option => option.label === 'hscale')).toEqual({
      label: 'hscale',
      type: 'property',
    });
  });

  it('leaves out the complete symbol under the cursor', () => {
    const labels = complete('{ signal')?.options.map(option => option.label) ?? [];

    expect(labels).toHaveLength(17);
    expect(labels).not.toContain('signal');
  });

  it('stays quiet on an empty prefix unless asked', () => {
    expect(complete('{ ')).toBeNull();
    expect(complete('{ ', true)?.options).toHaveLength(18);
  });
});
