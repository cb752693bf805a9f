// `objdump -a` prints e.g. "firmware.elf:     file format elf32-littlearm"
// objdump also reports "file format not recognized" for foreign files
const FILE_FORMAT_RE = /file format\s+(?!not recognized)(\S+)/;

export function detectFileFormat(archiveHeaders: string): string | undefined {
  const match = archiveHeaders.match(FILE_FORMAT_RE);
  return match ? match[1] : undefined;
}
