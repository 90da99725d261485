import {sendJson} from '../../http'
import type {RouteLogicHandler} from './types'

export const handleHealthRoute: RouteLogicHandler = ({response, proxyRequest}) => {
  sendJson({
    response,
    status: 200,
    requestId: proxyRequest.requestId,
    payload: {status: 'ok'}
  })
}
