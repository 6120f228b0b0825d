export { handleAppError } from "./app-error.handler"
export { handleHttpException } from "./http-exception.handler"
