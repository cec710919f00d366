export type BoundingBox = [number, number, number, number];

export interface Detection {
  class_name: string;
  confidence: number;
  bbox: BoundingBox;
}

export interface HealthResponse {
  detections: Array<Pick<Detection, 'class_name' | 'confidence'>>;
}

export interface PredictResponse {
  status: string;
}

export interface PendingResult {
  detections: [];
  timestamp: null;
  message: string;
}

export interface CompletedResult {
  detections: Detection[];
  timestamp: number;
  total_objects: number;
  message?: string;
}

export type ResultResponse = PendingResult | CompletedResult;

export interface PredictOptions {
  fileName?: string;
  contentType?: string;
}
