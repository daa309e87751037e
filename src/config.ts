const raise = (message: string): never => {
  throw new Error(message);
};

const stringEnvironment = (value: string, fallback?: string): string => {
  return (
    process.env[value] ??
    fallback ??
    raise(`Missing required environment variable: ${value}`)
  );
};

export default {
  agentUserId: stringEnvironment("AGENT_USER_ID"),
};
