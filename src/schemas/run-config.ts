import { z } from "zod";

const positiveInt = z.number().int().positive();

/** Mask extensions are compared without the dot and case-insensitively. */
const MaskExtensionSchema = z
  .string()
  .transform((ext) => ext.trim().replace(/^\./, "").toLowerCase())
  .pipe(z.string().min(1, "mask extension must not be empty"));

export const RunConfigSchema = z.object({
  project_root: z.string().min(1),
  images_dir: z.string().min(1),

  colmap_bin: z.string().min(1).default("colmap"),
  brush_bin: z.string().min(1).default("brush"),

  // Empty string disables the corresponding mask source.
  masks_dir: z.string().default(""),
  dense_masks_dir: z.string().default(""),
  mask_ext: MaskExtensionSchema.default("png"),

  sfm_max_image_size: positiveInt.default(4096),
  sift_max_num_features: positiveInt.default(8192),
  undistort_max_image_size: positiveInt.default(2400),
  camera_model: z.string().min(1).default("OPENCV"),
  single_camera: z.boolean().default(true),
  use_gpu: z.boolean().default(true),
  min_num_matches: positiveInt.default(32),
  refine_focal_length: z.boolean().default(true),
  refine_extra_params: z.boolean().default(true),
  refine_principal_point: z.boolean().default(false),

  run_training: z.boolean().default(true),
  training_total_steps: positiveInt.default(30000),
  /** Falls back to undistort_max_image_size when unset. */
  training_max_resolution: positiveInt.optional(),
  training_max_splats: positiveInt.default(6_000_000),
  training_export_every: positiveInt.default(5000),
  training_eval_split_every: positiveInt.default(10),
  training_export_name: z.string().min(1).default("export_{iter}.ply"),
  gpu_device: z.string().min(1).optional(),
});

export type RunConfig = Readonly<z.infer<typeof RunConfigSchema>>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;
