import { json } from "../util";

export const healthCheck = async (request: Request): Promise<Response> => {
    return json({ status: "ok" }, 200, request);
}
