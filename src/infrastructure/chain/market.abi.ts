import { Interface } from "ethers";

export const MARKET_ABI = [
  "event JobOpened(bytes32 indexed job, string metadata, address indexed owner, address indexed provider, uint256 rate, uint256 balance, uint256 timestamp)",
  "function providers(address) view returns (string cp)"
];

export const marketInterface = new Interface(MARKET_ABI);

const jobOpened = marketInterface.getEvent("JobOpened");
if (!jobOpened) {
  throw new Error("Market ABI is missing the JobOpened event");
}

export const JOB_OPENED_TOPIC0 = jobOpened.topicHash;
