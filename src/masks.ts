import { IMAGE_EXTENSIONS, countMatchingFiles, isDirectory, normalizeExtension } from "./fs-utils.js";
import type { MaskDecision, MaskNote, MaskResolution } from "./schemas/mask-decision.js";

/**
 * Decide whether a mask directory takes part in a stage.
 *
 * Masks are matched against images by the downstream tool, so this only
 * counts: an existing directory with at least one `*.<extension>` file turns
 * masking on. Fewer masks than images is reported but still active; the tool
 * processes images without a mask unmasked.
 */
export function resolveMasks(
  candidateDir: string,
  imagesDir: string,
  extension: string,
): MaskResolution {
  const ext = normalizeExtension(extension);
  const inactive = (imageCount: number, sourceDir: string): MaskDecision => ({
    active: false,
    source_dir: sourceDir,
    mask_count: 0,
    image_count: imageCount,
    extension: ext,
  });

  if (candidateDir.length === 0) {
    return {
      decision: inactive(0, ""),
      notes: [{ level: "info", message: "No mask directory configured; continuing without masks." }],
    };
  }

  if (!isDirectory(candidateDir)) {
    return {
      decision: inactive(0, ""),
      notes: [
        {
          level: "info",
          message: `Mask directory not found: ${candidateDir}; continuing without masks.`,
        },
      ],
    };
  }

  const imageCount = countMatchingFiles(imagesDir, IMAGE_EXTENSIONS);
  const maskCount = countMatchingFiles(candidateDir, [ext]);

  if (maskCount === 0) {
    return {
      decision: inactive(imageCount, candidateDir),
      notes: [
        {
          level: "warning",
          message: `Mask directory ${candidateDir} has no *.${ext} files; continuing without masks.`,
        },
      ],
    };
  }

  const notes: MaskNote[] = [
    {
      level: "info",
      message: `Using ${maskCount} mask(s) from ${candidateDir} (expected up to ${imageCount}).`,
    },
  ];
  if (imageCount > 0 && maskCount < imageCount) {
    notes.push({
      level: "warning",
      message: `Fewer masks than images (${maskCount} < ${imageCount}); images without a mask are processed unmasked.`,
    });
  }

  return {
    decision: {
      active: true,
      source_dir: candidateDir,
      mask_count: maskCount,
      image_count: imageCount,
      extension: ext,
    },
    notes,
  };
}
