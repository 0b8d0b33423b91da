export { select, type PathSegment } from "@/utils/queries"
