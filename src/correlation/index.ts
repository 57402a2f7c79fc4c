export {
	createNotificationBuffer,
	type NotificationBuffer,
} from "./notification-buffer";

export {
	CONNECT_KEY,
	type CharacteristicWriteKey,
	type ConnectKey,
	characteristicWriteKey,
	type DescriptorWriteKey,
	descriptorWriteKey,
	formatOperationKey,
	type NotificationReadKey,
	notificationReadKey,
	type OperationKey,
	type OperationKind,
} from "./operation-key";

export {
	createPendingTable,
	type PendingTable,
	type PendingTableOptions,
	type Waiter,
} from "./pending-table";
