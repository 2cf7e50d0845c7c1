import { TextFileView, type WorkspaceLeaf } from 'obsidian';
import { EditorState } from '@codemirror/state';
import { EditorView } from '@codemirror/view';
import { wavejsonEditor } from './editorExtensions';

export const WAVEJSON_VIEW_TYPE = 'wavedrom-wavejson-view';

/** Files with this extension open in the WaveJSON view */
export const WAVEJSON_EXTENSION = 'wjson';

/**
 * Plain-text editor for .wjson files, backed by CodeMirror with WaveJSON
 * highlighting and completion. Edits are saved through Obsidian's own
 * debounced requestSave, which in turn fires the vault's modify event.
 */
export class WaveJsonView extends TextFileView {
  private editor: EditorView;

  constructor(leaf: WorkspaceLeaf) {
    super(leaf);
    this.editor = new EditorView({
      parent: this.contentEl,
      state: this.createState(''),
    });
  }

  private createState(doc: string): EditorState {
    return EditorState.create({
      doc,
      extensions: wavejsonEditor(() => this.requestSave()),
    });
  }

  getViewType(): string {
    return WAVEJSON_VIEW_TYPE;
  }

  getDisplayText(): string {
    return this.file?.basename ?? 'WaveJSON';
  }

  getIcon(): string {
    return 'activity';
  }

  getViewData(): string {
    return this.editor.state.doc.toString();
  }

  setViewData(data: string, clear: boolean): void {
    // Reloads of our own save come back unchanged; keep the undo history
    if (!clear && data === this.getViewData()) return;
    this.editor.setState(this.createState(data));
  }

  clear(): void {
    this.editor.setState(this.createState(''));
  }

  async onClose(): Promise<void> {
    this.editor.destroy();
  }
}
