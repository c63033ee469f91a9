import { execFile } from 'child_process';

/**
 * Run a program without a shell
 * @param throwOnError Whether to reject when the program exits non-zero (defaults to true)
 */
export async function executeCommand(
  file: string,
  args: readonly string[],
  throwOnError = true
): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    execFile(file, [...args], (error, stdout, stderr) => {
      if (error && throwOnError) {
        reject(error);
      } else {
        resolve({
          stdout: stdout.trim(),
          stderr: stderr ? stderr.trim() : ''
        });
      }
    });
  });
}
