import { RemoteOperation } from '../../shared/interfaces';
import { RemoteFileInfo } from '../interfaces';

/**
 * Remote filesystem operations used by the chunked pusher.
 * Each script resolves $1 against the remote working directory and takes
 * nothing from the surrounding environment.
 */

/** Delete $1 if it exists */
export const REMOVE_FILE: RemoteOperation = {
  name: 'removeFile',
  script: `
target=$(realpath -m -- "$1") || exit 1
if [ -e "$target" ] || [ -L "$target" ]; then
  rm -f -- "$target" || exit 1
fi
`.trim(),
};

/** Create the parent directory of $1 recursively */
export const ENSURE_PARENT_DIRECTORY: RemoteOperation = {
  name: 'ensureParentDirectory',
  script: `
target=$(realpath -m -- "$1") || exit 1
mkdir -p -- "$(dirname -- "$target")"
`.trim(),
};

/** Create $1 without truncating it */
export const TOUCH_FILE: RemoteOperation = {
  name: 'touchFile',
  script: `
target=$(realpath -m -- "$1") || exit 1
: >> "$target"
`.trim(),
};

/**
 * Append stdin to the end of $1.
 * The chunk is staged beside the destination and only appended once all
 * $2 bytes have arrived.
 */
export const APPEND_CHUNK: RemoteOperation = {
  name: 'appendChunk',
  script: `
target=$(realpath -m -- "$1") || exit 1
part=$(mktemp "$target.part.XXXXXX") || exit 1
trap 'rm -f -- "$part"' EXIT
cat > "$part" || exit 1
size=$(stat -c %s -- "$part") || exit 1
if [ "$size" != "$2" ]; then
  echo "received $size of $2 bytes" >&2
  exit 1
fi
cat -- "$part" >> "$target"
`.trim(),
};

/** Exit status when statFile finds nothing at $1 */
export const STAT_MISSING_EXIT_CODE = 2;

/** Print the absolute path and size of $1 */
export const STAT_FILE: RemoteOperation = {
  name: 'statFile',
  script: `
target=$(realpath -m -- "$1") || exit 1
[ -f "$target" ] || exit ${STAT_MISSING_EXIT_CODE}
printf '%s\\n%s\\n' "$target" "$(stat -c %s -- "$target")"
`.trim(),
};

/**
 * Parse statFile output: absolute path on the first line, size on the second
 * @returns null when the output is not in that shape
 */
export function parseStatOutput(stdout: string): RemoteFileInfo | null {
  const [filePath, sizeText] = stdout.split('\n');
  if (!filePath || !sizeText || !/^\d+$/.test(sizeText.trim())) {
    return null;
  }

  return {
    path: filePath,
    exists: true,
    size: Number(sizeText.trim()),
  };
}
