type Detected = { contentType: string; extension: string };

const IMAGE_TYPES: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/jpg": "jpg",
  "image/webp": "webp",
};

const MODEL_TYPES: Record<string, string> = {
  "model/gltf-binary": "glb",
  "model/gltf+json": "gltf",
  "model/vnd.gltf+json": "gltf",
  "model/obj": "obj",
  "model/stl": "stl",
};

const MODEL_EXTENSIONS: Record<string, string> = {
  glb: "model/gltf-binary",
  gltf: "model/gltf+json",
  obj: "model/obj",
  stl: "model/stl",
};

function baseType(contentType: string): string {
  return contentType.split(";")[0].trim().toLowerCase();
}

function startsWith(bytes: Uint8Array, prefix: number[], offset = 0): boolean {
  if (bytes.byteLength < offset + prefix.length) return false;
  return prefix.every((b, i) => bytes[offset + i] === b);
}

export function sniffImage(bytes: Uint8Array): Detected | null {
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47])) return { contentType: "image/png", extension: "png" };
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return { contentType: "image/jpeg", extension: "jpg" };
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) {
    return { contentType: "image/webp", extension: "webp" };
  }
  return null;
}

/** Resolves the image type from the header, falling back to magic bytes. */
export function detectImageType(contentType: string, bytes: Uint8Array): Detected | null {
  const base = baseType(contentType);
  const ext = IMAGE_TYPES[base];
  if (ext) return { contentType: base === "image/jpg" ? "image/jpeg" : base, extension: ext };
  if (!base || base === "application/octet-stream" || base.startsWith("image/")) return sniffImage(bytes);
  return null;
}

function extensionFromUrl(url: string | undefined): string | null {
  if (!url) return null;
  try {
    const pathname = new URL(url).pathname;
    const match = pathname.match(/\.([a-z0-9]+)$/i);
    return match ? match[1].toLowerCase() : null;
  } catch {
    return null;
  }
}

/**
 * Resolves a mesh type from the header, the source URL's extension, or the
 * glTF binary magic. Unknown binary payloads default to GLB.
 */
export function detectModelType(contentType: string, bytes: Uint8Array, sourceUrl?: string): Detected | null {
  const base = baseType(contentType);
  const ext = MODEL_TYPES[base];
  if (ext) return { contentType: MODEL_EXTENSIONS[ext], extension: ext };

  const urlExt = extensionFromUrl(sourceUrl);
  if (urlExt && MODEL_EXTENSIONS[urlExt]) return { contentType: MODEL_EXTENSIONS[urlExt], extension: urlExt };

  if (startsWith(bytes, [0x67, 0x6c, 0x54, 0x46])) return { contentType: "model/gltf-binary", extension: "glb" };
  if (!base || base === "application/octet-stream" || base === "binary/octet-stream") {
    return { contentType: "model/gltf-binary", extension: "glb" };
  }
  return null;
}
