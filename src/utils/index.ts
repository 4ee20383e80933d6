export { snakeToCamelCase } from "@/utils/case"
export { getLogger, setLogger, type Logger } from "@/utils/logger"
