import { writeFileSync } from 'fs';

/** Writes a rendered report to `outputFile`, or to stdout when none is given. */
export function writeReport(payload: string, outputFile: string | null, label: string): void {
  if (outputFile) {
    writeFileSync(outputFile, payload, 'utf8');
    console.error(`✓ ${label} report written to ${outputFile}`);
  } else {
    process.stdout.write(payload);
  }
}
