export * from "./geometry/scalar";
export * from "./geometry/debug-assert";
export * from "./geometry/direction";
export * from "./geometry/pos";
export * from "./geometry/size";
export * from "./geometry/aspect-ratio";
export * from "./geometry/insets";
export * from "./geometry/margin";
export * from "./geometry/padding";
export * from "./geometry/anchor";
export * from "./geometry/placement";
export * from "./geometry/quad-subdivide";
export * from "./geometry/rect";
export * from "./geometry/rect-query";
export * from "./geometry/rect-partition";
export * from "./geometry/rect-inset";
