import type { AiServiceName } from "../config/schema";

export interface UploadRequest {
  prompt: string;
  imagePaths: string[];
}

export interface UploadResult {
  service: AiServiceName;
  display_name: string;
  success: boolean;
  message: string;
  uploaded_at: string;
  response_url: string | null;
}

/** Posts one request on `page` and resolves the conversation URL. */
export type ServiceUploader<P> = (page: P, serviceUrl: string, request: UploadRequest) => Promise<string>;

export interface PageHandle<P> {
  page: P;
  close(): Promise<void>;
}

export const SERVICE_DISPLAY_NAMES: Record<AiServiceName, string> = {
  chatgpt: "ChatGPT",
  claude: "Claude",
  gemini: "Gemini"
};
