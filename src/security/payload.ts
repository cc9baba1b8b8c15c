import { wipeBuffer, SensitiveBuffer } from './sensitive.js';
import type { Artifact } from './artifact.js';

const HEX = '0123456789abcdef';

// Escapes raw bytes as the body of a JSON string without ever decoding them
// into a JS string. Bytes >= 0x80 pass through, so valid UTF-8 stays valid.
function escapeJsonBytes(src: Uint8Array): Buffer {
  let len = 0;
  for (const b of src) {
    if (b === 0x22 || b === 0x5c) len += 2;
    else if (b < 0x20) len += 6;
    else len += 1;
  }
  const out = Buffer.alloc(len);
  let o = 0;
  for (const b of src) {
    if (b === 0x22 || b === 0x5c) {
      out[o++] = 0x5c;
      out[o++] = b;
    } else if (b < 0x20) {
      out[o++] = 0x5c; // \
      out[o++] = 0x75; // u
      out[o++] = 0x30;
      out[o++] = 0x30;
      out[o++] = HEX.charCodeAt(b >> 4);
      out[o++] = HEX.charCodeAt(b & 0x0f);
    } else {
      out[o++] = b;
    }
  }
  return out;
}

/**
 * Serializes artifacts, values included, into one JSON array payload:
 * `[{"name","value","domain","expiresAt","secure","httpOnly"}, ...]`.
 *
 * The result is a SensitiveBuffer the caller must hand to the lifecycle guard.
 * Intermediate buffers holding value bytes are wiped before returning.
 */
export function serializeArtifacts(artifacts: readonly Artifact[]): SensitiveBuffer {
  const chunks: Buffer[] = [];
  const sensitive: Buffer[] = [];
  chunks.push(Buffer.from('['));
  artifacts.forEach((a, i) => {
    if (i > 0) chunks.push(Buffer.from(','));
    chunks.push(Buffer.from(`{"name":${JSON.stringify(a.name)},"value":"`));
    const escaped = escapeJsonBytes(a.value);
    sensitive.push(escaped);
    chunks.push(escaped);
    const tail = {
      domain: a.domain,
      expiresAt: a.expiresAt ? a.expiresAt.toISOString() : null,
      secure: a.secure,
      httpOnly: a.httpOnly,
    };
    // '"' closes the value, then the rest of the object minus its opening brace
    chunks.push(Buffer.from('",' + JSON.stringify(tail).slice(1)));
  });
  chunks.push(Buffer.from(']'));
  const joined = Buffer.concat(chunks);
  try {
    return new SensitiveBuffer(joined);
  } finally {
    wipeBuffer(joined);
    for (const s of sensitive) wipeBuffer(s);
  }
}
