export const PREDICT_ACCEPTED = "Image received for prediction";

export class PredictResponseDto {
  status!: typeof PREDICT_ACCEPTED;
}
