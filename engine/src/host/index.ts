export type { EditorHost, BufferEnterListener } from './types.js';
export { NodeEditorHost, type NodeEditorHostOptions } from './node-editor-host.js';
