import type { PrintMode } from './print-job.model';

export interface PrintingConfig {
  default_printer: string;
  preview_dpi: number;
  print_dpi: number;
  bw_threshold: number;
  max_pdf_pages_process: number;
  default_mode: PrintMode;
  default_copies: number;
}

export interface AppConfig {
  app: {
    max_upload_mb: number;
  };
  printing: PrintingConfig;
  airprint: {
    auto_enable: boolean;
  };
  ui: {
    default_dark_mode: boolean;
    default_eink_mode: boolean;
  };
  security: {
    require_token: boolean;
    token: string;
  };
}

export function defaultConfig(): AppConfig {
  return {
    app: { max_upload_mb: 25 },
    printing: {
      default_printer: '',
      preview_dpi: 150,
      print_dpi: 200,
      bw_threshold: 180,
      max_pdf_pages_process: 30,
      default_mode: 'grayscale',
      default_copies: 1,
    },
    airprint: { auto_enable: true },
    ui: { default_dark_mode: false, default_eink_mode: false },
    security: { require_token: false, token: '' },
  };
}
