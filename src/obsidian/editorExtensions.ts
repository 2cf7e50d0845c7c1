/**
 * CodeMirror extensions for editing WaveJSON
 *
 * Highlighting marks every classified token with a `cm-wavejson-*` class
 * (styled in styles.css) on top of the JavaScript grammar, which colours
 * strings and numbers; completion offers the vocabulary identifiers.
 */

import { RangeSetBuilder, type Extension } from '@codemirror/state';
import {
  Decoration,
  EditorView,
  ViewPlugin,
  drawSelection,
  keymap,
  type DecorationSet,
  type ViewUpdate,
} from '@codemirror/view';
import { defaultKeymap, history, historyKeymap } from '@codemirror/commands';
import { defaultHighlightStyle, syntaxHighlighting } from '@codemirror/language';
import { javascript } from '@codemirror/lang-javascript';
import {
  autocompletion,
  closeBrackets,
  closeBracketsKeymap,
  type Completion,
  type CompletionContext,
  type CompletionResult,
} from '@codemirror/autocomplete';
import { classifyToken, completionCandidates, scanTokens, symbolAt, type TokenCategory } from '../core';

export const TOKEN_CLASSES: Readonly<Record<TokenCategory, string>> = {
  keyword: 'cm-wavejson-keyword',
  signalAttribute: 'cm-wavejson-signal-attribute',
  configAttribute: 'cm-wavejson-config-attribute',
  headFootAttribute: 'cm-wavejson-headfoot-attribute',
  bracket: 'cm-wavejson-bracket',
  punctuation: 'cm-wavejson-punctuation',
};

const TOKEN_MARKS: Readonly<Record<TokenCategory, Decoration>> = {
  keyword: Decoration.mark({ class: TOKEN_CLASSES.keyword }),
  signalAttribute: Decoration.mark({ class: TOKEN_CLASSES.signalAttribute }),
  configAttribute: Decoration.mark({ class: TOKEN_CLASSES.configAttribute }),
  headFootAttribute: Decoration.mark({ class: TOKEN_CLASSES.headFootAttribute }),
  bracket: Decoration.mark({ class: TOKEN_CLASSES.bracket }),
  punctuation: Decoration.mark({ class: TOKEN_CLASSES.punctuation }),
};

const SYMBOL_BEFORE = /[A-Za-z0-9_$]*/;

/**
 * Decorations for the visible part of the document
 *
 * Ranges are widened to whole lines so scanning never starts inside a
 * string literal.
 */
function buildDecorations(view: EditorView): DecorationSet {
  const builder = new RangeSetBuilder<Decoration>();
  const { doc } = view.state;
  let scannedTo = 0;

  for (const range of view.visibleRanges) {
    const from = Math.max(doc.lineAt(range.from).from, scannedTo);
    const to = doc.lineAt(range.to).to;
    if (from >= to) continue;

    for (const span of scanTokens(doc.sliceString(from, to))) {
      if (span.category) {
        builder.add(from + span.from, from + span.to, TOKEN_MARKS[span.category]);
      }
    }
    scannedTo = to;
  }

  return builder.finish();
}

export const wavejsonHighlighter = ViewPlugin.fromClass(
  class {
    decorations: DecorationSet;

    constructor(view: EditorView) {
      this.decorations = buildDecorations(view);
    }

    update(update: ViewUpdate) {
      if (update.docChanged || update.viewportChanged) {
        this.decorations = buildDecorations(update.view);
      }
    }
  },
  { decorations: plugin => plugin.decorations },
);

function toCompletion(label: string): Completion {
  return {
    label,
    type: classifyToken(label) === 'keyword' ? 'keyword' : 'property',
  };
}

/**
 * Completion source: every identifier except the symbol under the cursor.
 * CodeMirror does the prefix filtering.
 */
export function wavejsonCompletions(context: CompletionContext): CompletionResult | null {
  const word = context.matchBefore(SYMBOL_BEFORE);
  if (!word || (word.from === word.to && !context.explicit)) return null;

  const line = context.state.doc.lineAt(context.pos);
  const symbol = symbolAt(line.text, context.pos - line.from);

  return {
    from: word.from,
    options: completionCandidates(symbol?.text ?? '').map(toCompletion),
  };
}

/**
 * Everything the WaveJSON editor needs, plus a listener for edits
 */
export function wavejsonEditor(onDocChanged: () => void): Extension[] {
  return [
    javascript(),
    syntaxHighlighting(defaultHighlightStyle, { fallback: true }),
    history(),
    drawSelection(),
    closeBrackets(),
    autocompletion({ override: [wavejsonCompletions] }),
    keymap.of([...closeBracketsKeymap, ...defaultKeymap, ...historyKeymap]),
    wavejsonHighlighter,
    EditorView.lineWrapping,
    EditorView.updateListener.of(update => {
      if (update.docChanged) onDocChanged();
    }),
  ];
}
