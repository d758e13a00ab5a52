import { InvitationStatus } from '../entities/invitation.entity';

export interface InvitationResponse {
    id: number;
    title: string;
    description: string;
    companyName: string;
    receiverName: string;
    status: InvitationStatus;
}
