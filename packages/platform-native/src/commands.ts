export interface CommandLine {
  command: string;
  args: string[];
}

const powershell = (script: string): CommandLine => ({
  command: 'powershell',
  args: ['-NoProfile', '-NonInteractive', '-Command', script],
});

const quotePowerShell = (value: string) => `'${value.replace(/'/g, "''")}'`;

export const clipboardReadCommand = (platform: NodeJS.Platform): CommandLine => {
  switch (platform) {
    case 'darwin':
      return { command: 'pbpaste', args: [] };
    case 'win32':
      return powershell('Get-Clipboard -Raw');
    default:
      return { command: 'xclip', args: ['-selection', 'clipboard', '-o'] };
  }
};

/** The text is written to the command's stdin. */
export const clipboardWriteCommand = (platform: NodeJS.Platform): CommandLine => {
  switch (platform) {
    case 'darwin':
      return { command: 'pbcopy', args: [] };
    case 'win32':
      return powershell('[Console]::In.ReadToEnd() | Set-Clipboard');
    default:
      return { command: 'xclip', args: ['-selection', 'clipboard', '-i'] };
  }
};

export const playbackCommand = (
  platform: NodeJS.Platform,
  filePath: string,
  volume = 1
): CommandLine => {
  switch (platform) {
    case 'darwin':
      return { command: 'afplay', args: ['-v', volume.toFixed(2), filePath] };
    case 'win32':
      return powershell(`(New-Object Media.SoundPlayer ${quotePowerShell(filePath)}).PlaySync()`);
    default:
      return { command: 'aplay', args: ['-q', filePath] };
  }
};

/** Interactive region capture into a PNG file. Null where no tool is supported. */
export const regionCaptureCommand = (
  platform: NodeJS.Platform,
  outputPath: string
): CommandLine | null => {
  switch (platform) {
    case 'darwin':
      return { command: 'screencapture', args: ['-i', '-x', '-t', 'png', outputPath] };
    case 'linux':
      return { command: 'gnome-screenshot', args: ['-a', '-f', outputPath] };
    default:
      return null;
  }
};
