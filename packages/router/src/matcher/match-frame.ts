export const enum FrameStage {
  Enter,
  Literal,
  Partials,
  Parameter,
  Wildcard,
  CatchAll,
  Exit,
}

export type MatchFrame = {
  nodeIndex: number;
  segmentIndex: number;
  stage: FrameStage;
  // Capture count when the frame was entered; restored before each alternative
  paramBase: number;
  // Next partial or parameter edge to try within the current stage
  cursor: number;
};
