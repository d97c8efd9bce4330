import { spawn } from 'child_process';

export function parseEditorCommand(args: { editor: string }) {
  const parts = args.editor.trim().split(/\s+/).filter(part => part.length > 0);
  return {
    command: parts[0] || 'code',
    args: parts.slice(1),
  };
}

/** Launches the editor detached so the CLI can exit right away. */
export function openInEditor(args: { editor: string; path: string; onError: (error: Error) => void }) {
  const editorCommand = parseEditorCommand({ editor: args.editor });
  const child = spawn(editorCommand.command, [...editorCommand.args, args.path], {
    detached: true,
    stdio: 'ignore',
  });
  child.on('error', args.onError);
  child.unref();
  return editorCommand;
}
