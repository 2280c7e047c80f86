export {contextMiddleware, type RequestContext} from './context';
export {deadlineMiddleware} from './deadline';
export {errorMiddleware} from './error-handler';
export {finishMiddleware} from './finish';
export {requestParamsMiddleware} from './request-params';
export {telemetryHeadersMiddleware} from './telemetry-headers';
