export const MAIN_USAGE = `splatpipe — COLMAP reconstruction and Brush splat training over an image folder

Usage:
  splatpipe <command> [options]

Commands:
  run <project_dir> <images_dir>     Run the full pipeline (features → training)
  masks <project_dir> <images_dir>   Report which mask directories would be used
  layout <project_dir> [images_dir]  Print the derived dataset paths

Options:
  --help, -h                         Show this help message

Run "splatpipe <command> --help" for command-specific options.`;

export const RUN_USAGE = `splatpipe run — run the full pipeline

Usage:
  splatpipe run <project_dir> <images_dir> [options]

Arguments:
  <project_dir>                   Folder for the database, sparse/ and dense/ outputs
  <images_dir>                    Folder of source images

Masks:
  --masks <dir>                   Masks for the original images (feature extraction)
  --dense-masks <dir>             Masks for the undistorted images (training)
  --mask-ext <ext>                Mask file extension (default: png)

COLMAP:
  --colmap-bin <path>             COLMAP binary (default: colmap)
  --camera-model <model>          Camera model (default: OPENCV)
  --single-camera                 Share one camera across all images (default)
  --multi-camera                  One camera per image
  --no-gpu                        Disable GPU SIFT extraction and matching
  --sfm-max-image-size <n>        Feature extraction image size cap (default: 4096)
  --sift-max-num-features <n>     Feature count cap (default: 8192)
  --undistort-max-image-size <n>  Undistorted image size cap (default: 2400)
  --min-num-matches <n>           Mapper minimum matches (default: 32)
  --refine-focal-length <0|1>     Bundle adjustment: focal length (default: 1)
  --refine-extra-params <0|1>     Bundle adjustment: distortion (default: 1)
  --refine-principal-point <0|1>  Bundle adjustment: principal point (default: 0)

Brush:
  --brush-bin <path>              Brush binary (default: brush)
  --skip-training                 Stop after preparing the dataset
  --total-steps <n>               Training steps (default: 30000)
  --max-resolution <n>            Training resolution (default: undistort size)
  --max-splats <n>                Splat budget (default: 6000000)
  --export-every <n>              Export and eval cadence (default: 5000)
  --eval-split-every <n>          Hold out every n-th image (default: 10)
  --export-name <pattern>         Export file name (default: export_{iter}.ply)
  --gpu-device <id>               Sets CUBECL_DEFAULT_DEVICE for the trainer

  --help, -h                      Show this help message`;

export const MASKS_USAGE = `splatpipe masks — report mask decisions without running any tool

Usage:
  splatpipe masks <project_dir> <images_dir> [options]

Options:
  --masks <dir>                   Masks for the original images
  --dense-masks <dir>             Masks for the undistorted images
  --mask-ext <ext>                Mask file extension (default: png)
  --help, -h                      Show this help message`;

export const LAYOUT_USAGE = `splatpipe layout — print the derived dataset paths

Usage:
  splatpipe layout <project_dir> [images_dir]

Options:
  --help, -h                      Show this help message`;

export function usageFor(topic: "run" | "masks" | "layout" | undefined): string {
  switch (topic) {
    case "run":
      return RUN_USAGE;
    case "masks":
      return MASKS_USAGE;
    case "layout":
      return LAYOUT_USAGE;
    case undefined:
      return MAIN_USAGE;
  }
}
