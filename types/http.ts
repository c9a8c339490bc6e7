//interfaces for http route method inputs: params (Params), body (Body)

interface Params {
  job_id: string;
}

interface VerifyBody {
  job_data: string;
}

interface ValidateBody {
  job_id: string;
  transaction_id?: string;
  verifier_agent_id?: number | string;
}

interface ErrorReply {
  error: string;
  detail: string;
}

export { ErrorReply, Params, ValidateBody, VerifyBody };
