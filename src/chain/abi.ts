import { ethers } from 'ethers';

export const ORDER_FILLED_EVENT =
  'event OrderFilled(bytes32 indexed orderHash, address indexed maker, address indexed taker, uint256 makerAssetId, uint256 takerAssetId, uint256 makerAmountFilled, uint256 takerAmountFilled, uint256 fee)';

export const TOKEN_REGISTERED_EVENT =
  'event TokenRegistered(uint256 indexed token0, uint256 indexed token1, bytes32 indexed conditionId)';

export const CONDITION_PREPARATION_EVENT =
  'event ConditionPreparation(bytes32 indexed conditionId, address indexed oracle, bytes32 indexed questionId, uint256 outcomeSlotCount)';

export const CONDITION_RESOLUTION_EVENT =
  'event ConditionResolution(bytes32 indexed conditionId, address indexed oracle, bytes32 indexed questionId, uint256 outcomeSlotCount, uint256[] payoutNumerators)';

export const EXCHANGE_INTERFACE = new ethers.utils.Interface([
  ORDER_FILLED_EVENT,
  TOKEN_REGISTERED_EVENT,
]);

export const CONDITIONAL_TOKENS_INTERFACE = new ethers.utils.Interface([
  CONDITION_PREPARATION_EVENT,
  CONDITION_RESOLUTION_EVENT,
]);

export const ORDER_FILLED_TOPIC = EXCHANGE_INTERFACE.getEventTopic('OrderFilled');
export const TOKEN_REGISTERED_TOPIC = EXCHANGE_INTERFACE.getEventTopic('TokenRegistered');
export const CONDITION_PREPARATION_TOPIC = CONDITIONAL_TOKENS_INTERFACE.getEventTopic('ConditionPreparation');
export const CONDITION_RESOLUTION_TOPIC = CONDITIONAL_TOKENS_INTERFACE.getEventTopic('ConditionResolution');
